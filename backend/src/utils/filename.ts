import path from 'path';

/**
 * Reduce a client-supplied filename to a safe base name for headers and
 * disk: directory parts are dropped and anything outside [A-Za-z0-9._-]
 * becomes "_". Leading dots are stripped so the result is never hidden.
 */
export function safeFileName(name: string): string {
  const base = path.basename(name.replace(/\\/g, '/'));
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return cleaned || 'upload';
}
