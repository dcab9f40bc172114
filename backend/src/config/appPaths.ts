import path from 'path';

/** Resolves to backend/ both from src/config and from dist/config. */
const BACKEND_ROOT = path.resolve(__dirname, '..', '..');

export const appPaths = {
  uploadFormFile: path.join(BACKEND_ROOT, 'public', 'index.html'),
  defaultToolPath: path.join(BACKEND_ROOT, 'executable', 'dpt.jar'),
  defaultProtectConfigPath: path.join(BACKEND_ROOT, 'executable', 'dpt-protect-config-template.json')
};
