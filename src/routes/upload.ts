import fs from 'node:fs';
import path from 'node:path';
import { Router } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';

import { saveFile, uploadsDir } from '../store/files';
import type { UploadResponse } from '../types';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const safeName = (name: string): string => path.basename(name).replace(/[^\w.-]+/g, '_');

export const createUploadRouter = (): Router => {
  const router = Router();

  fs.mkdirSync(uploadsDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, uploadsDir);
    },
    filename: (_req, file, cb) => {
      cb(null, `${Date.now()}-${safeName(file.originalname)}`);
    },
  });

  const upload = multer({ storage, limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

  router.post('/', upload.single('resume'), (req, res) => {
    const resumeFile = req.file;

    if (!resumeFile) {
      return res.status(400).json({ error: 'A resume file is required (field "resume").' });
    }

    const id = `resume_${uuidv4()}`;

    saveFile({
      id,
      name: resumeFile.originalname,
      path: path.resolve(resumeFile.path),
      size: resumeFile.size,
      mimeType: resumeFile.mimetype,
      uploadedAt: new Date().toISOString(),
    });

    const body: UploadResponse = { files: [{ id, name: resumeFile.originalname }] };

    return res.json(body);
  });

  return router;
};
