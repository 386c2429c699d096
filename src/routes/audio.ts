import { Router } from 'express';

import { contentTypeFor, type SpeechSynthesizer } from '../speech/synthesizer';

export const createAudioRouter = (synthesizer: SpeechSynthesizer): Router => {
  const router = Router();

  router.get('/:fileName', (req, res, next) => {
    const { fileName } = req.params;
    const filePath = synthesizer.resolveArtifact(fileName);

    if (!filePath) {
      return res.status(400).json({ error: 'Invalid audio file name' });
    }

    res.type(contentTypeFor(fileName));

    return res.sendFile(filePath, (error?: NodeJS.ErrnoException) => {
      if (!error) {
        return;
      }

      if (error.code === 'ENOENT') {
        if (!res.headersSent) {
          res.status(404).json({ error: 'Audio not found or expired' });
        }
        return;
      }

      next(error);
    });
  });

  return router;
};
