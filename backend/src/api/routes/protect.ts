import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createReadStream } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { createServiceLogger } from '../../services/logger';
import { UploadValidationError } from '../../services/protection/errors';
import type { DeliverArtifact } from '../../services/protection/jobRunner';
import type { AppContext } from '../../types/appContext';
import type { Artifact } from '../../types/protection';

const log = createServiceLogger('protect-route');

/**
 * POST /protect
 *
 * multipart/form-data with the package in `apk_file` and the option fields.
 * The request stays open for the whole tool run; the protected file is the
 * response body.
 */

/**
 * multer writes the upload straight into the scratch directory under a random
 * name; the extension is kept (lower-cased, sanitized) since the tool derives
 * its output name from it.
 */
export function createUploadMiddleware({ config }: AppContext): RequestHandler {
  const storage = multer.diskStorage({
    destination: config.storage.scratchDir,
    filename: (_req, file, cb) => {
      const extension = path.extname(file.originalname).toLowerCase().replace(/[^a-z0-9.]/g, '');
      cb(null, `upload_${uuidv4()}${extension}`);
    }
  });

  const receive = multer({
    storage,
    limits: {
      fileSize: config.upload.maxUploadBytes,
      files: 1,
      fields: 20
    }
  }).single(config.upload.fileField);

  // Parser errors (truncated body, bad part headers) are plain Errors without
  // an errno code; they are the client's fault. Disk errors keep their code.
  return (req, res, next) => {
    receive(req, res, (error?: unknown) => {
      if (error instanceof Error && !(error instanceof multer.MulterError) && !('code' in error)) {
        next(new UploadValidationError('Invalid upload', error.message));
        return;
      }
      next(error);
    });
  };
}

function artifactDelivery(res: Response): DeliverArtifact {
  return async (artifact: Artifact) => {
    res.status(200).set({
      'Content-Type': artifact.contentType,
      'Content-Length': String(artifact.sizeBytes),
      'Content-Disposition': `attachment; filename="${artifact.downloadName}"`,
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      Pragma: 'no-cache',
      Expires: '0'
    });
    await pipeline(createReadStream(artifact.path), res);
  };
}

export function createProtectHandler({ config, jobRunner }: AppContext): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new UploadValidationError(
          'No APK file provided',
          `Attach the package in the "${config.upload.fileField}" field`
        );
      }

      const outcome = await jobRunner.runJob(
        {
          upload: {
            originalName: req.file.originalname,
            storedPath: req.file.path,
            sizeBytes: req.file.size
          },
          fields: req.body
        },
        artifactDelivery(res)
      );
      log.info('artifact_served', `Sent ${outcome.artifactName}`, undefined, {
        jobId: outcome.jobId,
        durationMs: outcome.durationMs
      });
    } catch (error) {
      next(error);
    }
  };
}
