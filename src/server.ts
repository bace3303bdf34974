import cors from 'cors';
import express from 'express';

import { CardMakerError } from './errors';
import { logger } from './logger';
import type { CardRenderer } from './services/cards/cardRenderer';
import { parseSpellRecord } from './services/records/spellRecord';
import { defaultStyleDocument } from './services/style/styleConfig';

/**
 * Preview API: renders one record per request and answers with data URLs, so
 * a browser can show the card without anything being written to disk.
 */
export function createApp(renderer: CardRenderer) {
  const app = express();
  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const api = express.Router();

  api.get('/config/default', (_req, res) => {
    res.json(defaultStyleDocument());
  });

  api.post('/cards', async (req, res, next) => {
    try {
      const record = parseSpellRecord(req.body ?? {});
      const card = await renderer.render(record);
      res.json({
        name: card.name,
        pages: card.pages.map((page) => `data:image/png;base64,${page.toString('base64')}`),
      });
    } catch (error) {
      next(error);
    }
  });

  app.use('/api', api);

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      logger.error(`[API] ${err.message}`);
      if (err instanceof CardMakerError) {
        res.status(422).json({ message: err.message, code: err.code });
        return;
      }
      res.status(400).json({ message: err.message });
    }
  );

  return app;
}
