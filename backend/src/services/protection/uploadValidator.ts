import path from 'path';
import type { UploadConfig } from '../../config';

/**
 * Upload Validator
 *
 * Accept/reject decision for an uploaded package, made from its declared
 * filename and size only.
 */

export interface UploadDescriptor {
  originalName: string;
  sizeBytes: number;
}

export type UploadPolicy = Pick<UploadConfig, 'allowedExtensions' | 'maxUploadBytes' | 'protectedPrefix'>;

export type UploadDecision =
  | { accepted: true }
  | { accepted: false; reason: string; details: string };

const toMB = (bytes: number): string => (bytes / (1024 * 1024)).toFixed(2);

export function validateUpload(upload: UploadDescriptor, policy: UploadPolicy): UploadDecision {
  const name = upload.originalName.trim();

  if (name === '') {
    return { accepted: false, reason: 'No file selected', details: 'Choose an .apk or .aab file to upload.' };
  }

  const extension = path.extname(name).toLowerCase();
  if (!policy.allowedExtensions.includes(extension)) {
    const allowed = policy.allowedExtensions.map(ext => ext.slice(1).toUpperCase()).join(' and ');
    return {
      accepted: false,
      reason: `Invalid file type. Only ${allowed} files are supported`,
      details: `Received "${path.basename(name)}"`
    };
  }

  if (upload.sizeBytes > policy.maxUploadBytes) {
    return {
      accepted: false,
      reason: `File size (${toMB(upload.sizeBytes)} MB) exceeds maximum allowed size (${toMB(policy.maxUploadBytes)} MB)`,
      details: 'Please use a smaller package file.'
    };
  }

  if (upload.sizeBytes === 0) {
    return { accepted: false, reason: 'Uploaded file is empty', details: 'The uploaded file has no content.' };
  }

  if (path.basename(name).startsWith(policy.protectedPrefix)) {
    return {
      accepted: false,
      reason: 'This file appears to be already protected',
      details: 'Please upload the original package file, not the protected version.'
    };
  }

  return { accepted: true };
}
