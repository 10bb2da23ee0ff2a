import express, { Request, Response, NextFunction } from 'express';
import { ISetService } from '../interfaces/OrderedSet';
import { IncomparableKeyError, InvalidKeyError } from '../common/Errors';

export class HTTPServer {
  private readonly app: express.Application;
  private readonly service: ISetService;
  private readonly port: number;
  private server: ReturnType<express.Application['listen']> | null = null;

  constructor(service: ISetService, port: number) {
    this.service = service;
    this.port = port;
    this.app = express();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.get('/keys/:key', this.handleSearch.bind(this));

    this.app.put('/keys/:key', this.handleInsert.bind(this));

    this.app.delete('/keys/:key', this.handleRemove.bind(this));

    this.app.delete('/keys', this.handleClear.bind(this));

    this.app.get('/verify', this.handleVerify.bind(this));

    this.app.get('/stats', this.handleStats.bind(this));

    this.app.get('/debug', this.handleDebug.bind(this));
  }

  private setupErrorHandling(): void {
    // Errors raised by express itself (e.g. an undecodable path parameter) carry an HTTP status
    this.app.use((err: Error & { status?: unknown }, _req: Request, res: Response, _next: NextFunction) => {
      if (typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
        res.status(err.status).json({ error: err.message });
        return;
      }
      console.error('Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private handleSearch(req: Request, res: Response): void {
    const key = req.params['key'];
    if (!key) {
      res.status(400).json({ error: 'Key parameter required' });
      return;
    }

    try {
      const result = this.service.search(key);
      if (!result.present) {
        res.status(404).json({ error: 'Key not found', key });
        return;
      }
      res.json(result);
    } catch (err) {
      this.handleError('SEARCH', err, res);
    }
  }

  private handleInsert(req: Request, res: Response): void {
    const key = req.params['key'];
    if (!key) {
      res.status(400).json({ error: 'Key parameter required' });
      return;
    }

    try {
      const result = this.service.insert(key);
      res.status(result.inserted ? 201 : 200).json(result);
    } catch (err) {
      this.handleError('INSERT', err, res);
    }
  }

  private handleRemove(req: Request, res: Response): void {
    const key = req.params['key'];
    if (!key) {
      res.status(400).json({ error: 'Key parameter required' });
      return;
    }

    try {
      const result = this.service.remove(key);
      if (!result.removed) {
        res.status(404).json({ error: 'Key not found', key });
        return;
      }
      res.json(result);
    } catch (err) {
      this.handleError('REMOVE', err, res);
    }
  }

  private handleClear(_req: Request, res: Response): void {
    try {
      this.service.clear();
      res.json({ success: true });
    } catch (err) {
      this.handleError('CLEAR', err, res);
    }
  }

  private handleVerify(_req: Request, res: Response): void {
    try {
      res.json({ valid: this.service.verify() });
    } catch (err) {
      this.handleError('VERIFY', err, res);
    }
  }

  private handleStats(_req: Request, res: Response): void {
    try {
      res.json(this.service.stats());
    } catch (err) {
      this.handleError('STATS', err, res);
    }
  }

  private handleDebug(_req: Request, res: Response): void {
    try {
      res.type('text/plain').send(this.service.debugDump());
    } catch (err) {
      this.handleError('DEBUG', err, res);
    }
  }

  private handleError(operation: string, err: unknown, res: Response): void {
    if (err instanceof InvalidKeyError || err instanceof IncomparableKeyError) {
      res.status(400).json({ error: err.message });
      return;
    }
    console.error(`${operation} error:`, err);
    res.status(500).json({ error: 'Internal server error' });
  }

  /**
   * Port actually bound, which differs from the configured one when that is 0.
   */
  get listeningPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = this.app.listen(this.port, () => {
        console.log(`HTTP server listening on port ${this.listeningPort}`);
        resolve();
      });

      this.server.on('error', (err: Error) => {
        reject(err);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          console.log('HTTP server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
