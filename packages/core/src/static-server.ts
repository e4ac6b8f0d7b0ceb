import { EventEmitter } from 'events';
import http from 'http';
import path from 'path';
import express, { type NextFunction, type Request, type Response } from 'express';
import serveIndex from 'serve-index';
import type { Logger } from './logger.js';

export interface StaticServerConfig {
  root: string;
  host: string;
  port: number;
  /** Allowed file extensions without the leading dot */
  extensions: string[];
  /** Render index.html/index.htm for directories instead of a listing */
  directoryIndex: boolean;
  /** Headers set on every response */
  headers: Record<string, string>;
  logger?: Logger;
}

const INDEX_FILES = ['index.html', 'index.htm'];

/**
 * StaticServer - loopback file server for the generated output directory
 *
 * Answers GET and HEAD only. Files outside the extension allow-list and
 * paths escaping the root are reported as 404.
 */
export class StaticServer extends EventEmitter {
  private config: StaticServerConfig;
  private server: http.Server | null = null;
  private root: string;
  private allowed: Set<string>;

  constructor(config: StaticServerConfig) {
    super();
    this.config = config;
    this.root = path.resolve(config.root);
    this.allowed = new Set(config.extensions.map((ext) => ext.replace(/^\./, '').toLowerCase()));
  }

  /**
   * Start listening. Resolves with the bound port.
   */
  async start(): Promise<number> {
    if (this.server) {
      throw new Error('Static server already running');
    }

    const server = http.createServer(this.createApp());

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        server.off('listening', onListening);
        reject(err);
      };
      const onListening = () => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.config.port, this.config.host);
    });

    server.on('error', (err) => this.emit('error', err));
    this.server = server;

    const port = this.getPort();
    this.emit('ready', port);
    return port ?? this.config.port;
  }

  /**
   * Stop accepting connections and drop the open ones.
   * Resolves once the listening socket is released.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.emit('close');
  }

  getPort(): number | null {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return null;
  }

  isListening(): boolean {
    return this.server?.listening ?? false;
  }

  private createApp(): express.Express {
    const app = express();
    app.disable('x-powered-by');

    // Configured headers go on every response, errors included
    app.use((req, res, next) => {
      for (const [name, value] of Object.entries(this.config.headers)) {
        res.setHeader(name, value);
      }
      res.on('finish', () => {
        this.config.logger?.debug('Served', { method: req.method, path: req.originalUrl, status: res.statusCode });
      });
      next();
    });

    app.use((req, res, next) => {
      if (req.method !== 'GET' && req.method !== 'HEAD') {
        res.setHeader('Allow', 'GET, HEAD');
        res.status(405).type('text/plain').send('Method Not Allowed');
        return;
      }
      next();
    });

    app.use((req, res, next) => this.guard(req, res, next));

    app.use(
      express.static(this.root, {
        index: this.config.directoryIndex ? INDEX_FILES : false,
        dotfiles: 'ignore',
        setHeaders: (res, file) => {
          if (path.extname(file).toLowerCase() === '.wasm') {
            res.setHeader('Content-Type', 'application/wasm');
          }
        },
      })
    );

    app.use(
      serveIndex(this.root, {
        filter: (name) => this.isListed(name),
      })
    );

    app.use((_req, res) => {
      res.status(404).type('text/plain').send('Not Found');
    });

    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      this.config.logger?.error('Request failed', { method: req.method, path: req.originalUrl }, err);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.status(500).type('text/plain').send('Internal Server Error');
    });

    return app;
  }

  /**
   * Refuse paths escaping the root and files outside the allow-list
   */
  private guard(req: Request, res: Response, next: NextFunction): void {
    let pathname: string;
    try {
      pathname = decodeURIComponent(req.path);
    } catch {
      res.status(400).type('text/plain').send('Bad Request');
      return;
    }

    const target = path.resolve(this.root, `.${pathname}`);
    const inside = target === this.root || target.startsWith(this.root + path.sep);

    if (!inside || !this.isListed(pathname)) {
      res.status(404).type('text/plain').send('Not Found');
      return;
    }
    next();
  }

  /**
   * Listings show subdirectories and allowed files only
   */
  private isListed(name: string): boolean {
    return path.extname(name) === '' || this.isAllowed(name);
  }

  private isAllowed(file: string): boolean {
    return this.allowed.has(path.extname(file).slice(1).toLowerCase());
  }
}
