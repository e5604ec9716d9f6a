import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import path from 'path';
import fs from 'fs';
import { HTTP_STATUS, SessionError } from './errors.js';
import { API_KEY, ConfigStore } from './config.js';
import { TranslationClient } from './translator.js';
import { TranslationSession } from './session.js';
import { SessionEntry, UpdateEntry, processSave, processTranslate } from './processor.js';
import { toCueView } from './utils.js';

export interface AppDependencies {
  config: ConfigStore;
  client: TranslationClient;
  dataDir: string;
  charLimit?: number;
}

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

function readString(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Undefined when the upload is not valid UTF-8.
function decodeUpload(buffer: Buffer): string | undefined {
  try {
    return utf8.decode(buffer);
  } catch (err) {
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

const sendError = (res: Response, error: SessionError) => {
  res.status(HTTP_STATUS[error.kind]).json({ ...error, error: error.message });
};

export function createApp(deps: AppDependencies) {
  const app = express();
  const sessions = new Map<string, SessionEntry>();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES }
  });

  app.use(cors({ origin: '*' }));
  app.use(express.json({ limit: '10mb' }));

  const updateEntry: UpdateEntry = (id, partial) => {
    const entry = sessions.get(id);
    if (entry) {
      sessions.set(id, { ...entry, ...partial });
    }
  };

  const findEntry = (id: string, res: Response): SessionEntry | undefined => {
    const entry = sessions.get(id);
    if (!entry) {
      res.status(404).json({ error: 'Session not found' });
    }
    return entry;
  };

  const statusBody = (entry: SessionEntry) => ({
    id: entry.id,
    createdAt: entry.createdAt,
    originalFilename: entry.originalFilename,
    savedFilename: entry.savedFilename,
    message: entry.message,
    error: entry.error,
    ...entry.session.snapshot()
  });

  app.get('/api/config', (req, res) => {
    res.json({ hasApiKey: Boolean(deps.config.get(API_KEY)?.trim()) });
  });

  app.put('/api/config', (req, res) => {
    const apiKey = readString(req.body, 'apiKey');
    if (apiKey === undefined) {
      res.status(400).json({ error: 'apiKey must be a string' });
      return;
    }
    const result = deps.config.set(API_KEY, apiKey.trim());
    if (!result.ok) {
      console.error(`[Config] ${result.error.message}`);
      sendError(res, result.error);
      return;
    }
    res.json({ success: true });
  });

  app.post('/api/session', (req, res) => {
    const id = uuidv4();
    const session = new TranslationSession({
      client: deps.client,
      config: deps.config,
      charLimit: deps.charLimit
    });
    sessions.set(id, { id, session, createdAt: Date.now() });
    res.status(201).json({ sessionId: id });
  });

  app.post('/api/session/:id/load', upload.single('file'), (req, res) => {
    const entry = findEntry(req.params.id, res);
    if (!entry) return;

    let content: string | undefined;
    if (req.file) {
      content = decodeUpload(req.file.buffer);
      if (content === undefined) {
        res.status(400).json({ error: 'Subtitle file is not valid UTF-8' });
        return;
      }
    } else {
      content = readString(req.body, 'content');
    }
    if (content === undefined) {
      res.status(400).json({ error: 'No subtitle content provided' });
      return;
    }
    const originalFilename = req.file?.originalname ?? readString(req.body, 'filename');

    const result = entry.session.load(content);
    if (!result.ok) {
      updateEntry(entry.id, { message: 'Load failed', error: result.error, originalFilename: undefined });
      sendError(res, result.error);
      return;
    }

    const cueCount = entry.session.snapshot().cueCount;
    updateEntry(entry.id, {
      originalFilename,
      savedFilename: undefined,
      message: `Loaded ${cueCount} cues`,
      error: undefined
    });
    const updated = sessions.get(entry.id) ?? entry;
    res.json(statusBody(updated));
  });

  app.post('/api/session/:id/translate', (req, res) => {
    const entry = findEntry(req.params.id, res);
    if (!entry) return;

    const sourceLang = readString(req.body, 'sourceLang');
    const targetLang = readString(req.body, 'targetLang') ?? '';
    const blocked = entry.session.checkTranslate(sourceLang, targetLang);
    if (blocked) {
      sendError(res, blocked);
      return;
    }

    processTranslate(entry, sourceLang, targetLang, updateEntry).catch(err => {
      console.error(`[Session ${entry.id}] Unexpected translation failure:`, err);
    });
    res.status(202).json({ success: true });
  });

  app.get('/api/session/:id/status', (req, res) => {
    const entry = findEntry(req.params.id, res);
    if (!entry) return;
    res.json(statusBody(entry));
  });

  app.get('/api/session/:id/cues', (req, res) => {
    const entry = findEntry(req.params.id, res);
    if (!entry) return;
    const cues = entry.session.getDocument();
    if (!cues) {
      sendError(res, { kind: 'NoDocument', message: 'No subtitle file is loaded' });
      return;
    }
    res.json(cues.map(toCueView));
  });

  app.get('/api/session/:id/srt', (req, res) => {
    const entry = findEntry(req.params.id, res);
    if (!entry) return;
    const result = entry.session.serialize();
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }
    res.type('application/x-subrip').send(result.value);
  });

  app.post('/api/session/:id/save', async (req, res, next) => {
    try {
      const entry = findEntry(req.params.id, res);
      if (!entry) return;
      const result = await processSave(entry, deps.dataDir, updateEntry);
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.json({ filename: result.value });
    } catch (err) {
      next(err);
    }
  });

  app.get('/api/session/:id/download', (req, res) => {
    const entry = findEntry(req.params.id, res);
    if (!entry) return;
    if (!entry.savedFilename) {
      res.status(404).json({ error: 'Nothing has been saved for this session' });
      return;
    }
    const filePath = path.join(deps.dataDir, entry.id, entry.savedFilename);
    if (fs.existsSync(filePath)) {
      res.download(filePath, entry.savedFilename);
    } else {
      res.status(404).json({ error: 'File on disk not found' });
    }
  });

  app.delete('/api/session/:id', (req, res) => {
    if (!sessions.delete(req.params.id)) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json({ success: true });
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    console.error('[Server]', err);
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: `Upload error: ${err.message}` });
    } else if (err) {
      res.status(500).json({ error: err instanceof Error && err.message ? err.message : 'Internal Server Error' });
    } else {
      next();
    }
  });

  return app;
}
