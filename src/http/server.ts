/**
 * HTTP Server - REST surface over the brand store and report service.
 *
 *   GET    /                          operator UI
 *   GET    /health                    { status, version }
 *   GET    /clients                   BrandConfig[]
 *   GET    /clients/:id               BrandConfig | 404
 *   POST   /clients                   upsert → BrandConfig
 *   DELETE /clients/:id               { message, client_id } | 404
 *   POST   /clients/:id/logo          multipart `file` → BrandConfig | 404
 *   POST   /reports/generate          ReportResponse | 404 | 422 | 500
 *   GET    /reports/download/:file    DOCX/PDF bytes | 404
 *   GET    /templates                 { templates: string[] }
 *
 * Uses Node's built-in `http` module; busboy parses the logo upload.
 * Every error body is `{ detail }`.
 *
 * @module http/server
 */

import * as http from 'node:http';
import * as fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { parseBrandConfig, parseReportRequest } from '../brand-schema.js';
import type { BrandStore } from '../brand-store.js';
import {
  BadRequestError,
  ClientNotFoundError,
  InvalidFileNameError,
  PdfConversionError,
  RequestValidationError,
  TemplateNotFoundError,
  statusForError,
} from '../errors.js';
import { getLogoPath, isPlainFileName } from '../report-paths.js';
import type { ReportService } from '../report-service.js';
import { VERSION } from '../version.js';
import { getAppHtml } from './app-html.js';
import { readJsonBody, readUploadedFile } from './request-body.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServerDeps {
  store: BrandStore;
  service: ReportService;
  /** Directory uploaded logos are written to. */
  logoDir: string;
  /** Default: 5 MiB */
  maxUploadBytes?: number;
  /** Suppress the per-request access log. */
  quiet?: boolean;
}

export interface ServerOptions extends ServerDeps {
  /** Default: 127.0.0.1 */
  host?: string;
  /** Default: 8000. `0` picks a free port. */
  port?: number;
}

export interface ReportServer {
  /** The URL the API is available at. */
  url: string;
  /** The port the server is listening on. */
  port: number;
  /** Stop accepting connections. Does not close the store. */
  close(): Promise<void>;
}

type RouteParams = Record<string, string>;

interface RouteContext {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  params: RouteParams;
  signal: AbortSignal;
}

interface Route {
  method: string;
  pattern: RegExp;
  keys: string[];
  handle: (ctx: RouteContext) => Promise<void> | void;
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

function sendDetail(res: http.ServerResponse, status: number, detail: string | string[]): void {
  sendJson(res, status, { detail });
}

/**
 * `attachment` disposition with an ASCII fallback name and the exact name
 * in RFC 5987 form.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Map any thrown error to `{ detail }` with the status from {@link statusForError}. */
function sendError(res: http.ServerResponse, req: http.IncomingMessage, err: unknown): void {
  const status = statusForError(err);

  if (status >= 500) {
    console.error(`[Server] ${req.method} ${req.url} failed: ${errorMessage(err)}`);
  }

  if (res.headersSent) {
    res.destroy();
    return;
  }

  if (err instanceof RequestValidationError) {
    sendDetail(res, status, err.issues);
  } else if (status >= 500) {
    sendDetail(res, status, `Internal server error: ${errorMessage(err)}`);
  } else {
    sendDetail(res, status, errorMessage(err));
  }
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

function route(method: string, path: string, handle: Route['handle']): Route {
  const keys: string[] = [];
  const source = path.replace(/:(\w+)/g, (_match, key: string) => {
    keys.push(key);
    return '([^/]+)';
  });
  return { method, pattern: new RegExp(`^${source}/?$`), keys, handle };
}

function matchParams(r: Route, pathname: string): RouteParams | null {
  const match = r.pattern.exec(pathname);
  if (!match) return null;

  const params: RouteParams = {};
  r.keys.forEach((key, i) => {
    const raw = match[i + 1] ?? '';
    try {
      params[key] = decodeURIComponent(raw);
    } catch {
      throw new BadRequestError(`Malformed path segment: ${raw}`);
    }
  });
  return params;
}

function buildRoutes(deps: ServerDeps): Route[] {
  const { store, service, logoDir } = deps;
  const maxUploadBytes = deps.maxUploadBytes ?? 5 * 1024 * 1024;
  const html = getAppHtml(VERSION);

  return [
    // -- Frontend --------------------------------------------------------
    route('GET', '/', ({ res }) => {
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(html);
    }),

    route('GET', '/health', ({ res }) => {
      sendJson(res, 200, { status: 'healthy', version: VERSION });
    }),

    // -- Clients ---------------------------------------------------------
    route('GET', '/clients', ({ res }) => {
      sendJson(res, 200, store.getAll());
    }),

    route('GET', '/clients/:id', ({ res, params }) => {
      const brand = store.get(params.id);
      if (!brand) throw new ClientNotFoundError(params.id);
      sendJson(res, 200, brand);
    }),

    route('POST', '/clients', async ({ req, res }) => {
      const brand = parseBrandConfig(await readJsonBody(req));
      sendJson(res, 200, await store.upsert(brand));
    }),

    route('DELETE', '/clients/:id', async ({ res, params }) => {
      const clientId = params.id;
      if (!(await store.delete(clientId))) {
        throw new ClientNotFoundError(clientId);
      }
      sendJson(res, 200, { message: 'Client deleted', client_id: clientId });
    }),

    route('POST', '/clients/:id/logo', async ({ req, res, params }) => {
      const clientId = params.id;
      if (!store.exists(clientId)) {
        req.resume();
        throw new ClientNotFoundError(clientId);
      }
      if (!isPlainFileName(clientId)) {
        req.resume();
        throw new InvalidFileNameError(clientId);
      }

      const upload = await readUploadedFile(req, 'file', maxUploadBytes);
      const logoPath = getLogoPath(logoDir, clientId, upload.filename);
      await fs.promises.mkdir(logoDir, { recursive: true });
      await fs.promises.writeFile(logoPath, upload.data);

      const brand = await store.updateLogo(clientId, logoPath);
      if (!brand) {
        // Deleted while the upload was in flight.
        await fs.promises.rm(logoPath, { force: true });
        throw new ClientNotFoundError(clientId);
      }
      sendJson(res, 200, brand);
    }),

    // -- Reports ---------------------------------------------------------
    route('POST', '/reports/generate', async ({ req, res, signal }) => {
      const request = parseReportRequest(await readJsonBody(req));

      try {
        sendJson(res, 200, await service.generate(request, signal));
      } catch (err) {
        if (err instanceof PdfConversionError) {
          console.error(`[Server] PDF conversion failed for ${request.client_id}: ${err.message}`);
          sendDetail(res, 500, `PDF conversion failed: ${err.message}`);
          return;
        }
        if (err instanceof TemplateNotFoundError) {
          console.warn(`[Server] Template not found for ${request.client_id}: ${err.templatePath}`);
        }
        if (statusForError(err) !== 500) {
          throw err;
        }
        console.error(`[Server] Rendering failed for ${request.client_id}: ${errorMessage(err)}`);
        sendDetail(res, 500, `Failed to render report: ${errorMessage(err)}`);
      }
    }),

    route('GET', '/reports/download/:filename', async ({ res, params }) => {
      const target = service.resolveDownload(params.filename);
      const { size } = await fs.promises.stat(target.path);

      res.writeHead(200, {
        'Content-Type': target.contentType,
        'Content-Length': size,
        'Content-Disposition': contentDisposition(target.filename),
      });
      await pipeline(fs.createReadStream(target.path), res);
    }),

    route('GET', '/templates', ({ res }) => {
      sendJson(res, 200, { templates: service.listTemplates() });
    }),
  ];
}

/**
 * Build the `(req, res)` listener. Exposed separately so tests and embedders
 * can mount it on their own server.
 */
export function createRequestHandler(deps: ServerDeps): http.RequestListener {
  const routes = buildRoutes(deps);

  const dispatch = async (req: http.IncomingMessage, res: http.ServerResponse, signal: AbortSignal): Promise<void> => {
    const method = req.method ?? 'GET';
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    let pathMatched = false;
    for (const r of routes) {
      const params = matchParams(r, pathname);
      if (params === null) continue;
      pathMatched = true;
      if (r.method !== method) continue;
      await r.handle({ req, res, params, signal });
      return;
    }

    req.resume();
    if (pathMatched) {
      throw new BadRequestError('Method Not Allowed', 405);
    }
    sendDetail(res, 404, 'Not Found');
  };

  return (req, res) => {
    const started = Date.now();
    const controller = new AbortController();

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });
    if (!deps.quiet) {
      res.on('finish', () => {
        console.log(`[Server] ${req.method} ${req.url} -> ${res.statusCode} (${Date.now() - started}ms)`);
      });
    }

    dispatch(req, res, controller.signal).catch((err: unknown) => sendError(res, req, err));
  };
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

/**
 * Start the HTTP server and resolve once it is listening.
 */
export function startServer(options: ServerOptions): Promise<ReportServer> {
  const host = options.host ?? '127.0.0.1';
  const server = http.createServer(createRequestHandler(options));

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(err);
    };

    server.once('error', onError);
    server.listen(options.port ?? 8000, host, () => {
      server.removeListener('error', onError);
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : (options.port ?? 8000);
      const urlHost = host.includes(':') ? `[${host}]` : host;

      resolve({
        url: `http://${urlHost}:${port}`,
        port,
        close: () =>
          new Promise<void>((res, rej) => {
            server.closeAllConnections();
            server.close((err) => (err ? rej(err) : res()));
          }),
      });
    });
  });
}
