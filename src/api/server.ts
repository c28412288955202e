import http from 'http';
import { DomainQueryController } from '../controllers/DomainQueryController';
import { NdjsonChannel } from './NdjsonChannel';
import { StaticFiles } from './StaticFiles';

export const API_VERSION = '1.0.0';

export interface IApiServerOptions {
  host: string;
  port: number;
  controller: DomainQueryController;
  staticFiles: StaticFiles;
}

/**
 * API Server for bulk domain queries
 * Provides the batch and streaming endpoints plus the bundled UI page
 */
export class ApiServer {
  private server: http.Server;
  private controller: DomainQueryController;
  private staticFiles: StaticFiles;
  private host: string;
  private port: number;

  constructor(options: IApiServerOptions) {
    this.host = options.host;
    this.port = options.port;
    this.controller = options.controller;
    this.staticFiles = options.staticFiles;
    this.server = this.createServer();
  }

  private createServer(): http.Server {
    return http.createServer((req, res) => {
      // Enable CORS for browser requests
      this.setCorsHeaders(res);

      // Handle preflight requests
      if (req.method === 'OPTIONS') {
        res.writeHead(204);
        res.end();
        return;
      }

      void this.handleRequest(req, res);
    });
  }

  private setCorsHeaders(res: http.ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    try {
      const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
      const method = req.method;

      console.log(`${new Date().toISOString()} - ${method} ${pathname}`);

      // Route handling
      if (pathname === '/' && method === 'GET') {
        res.writeHead(302, { Location: '/ui/domain-query' });
        res.end();
      } else if (pathname === '/api/health' && method === 'GET') {
        this.handleHealthCheck(res);
      } else if (pathname === '/domain-query/batch' && method === 'POST') {
        await this.handleBatchQuery(req, res);
      } else if (pathname === '/domain-query/batch-stream' && method === 'POST') {
        await this.handleStreamQuery(req, res);
      } else if (this.staticFiles.has(pathname) && method === 'GET') {
        await this.handleStaticFile(pathname, res);
      } else {
        this.sendError(res, 404, 'Endpoint not found');
      }
    } catch (error) {
      console.error(`${new Date().toISOString()} - Server error:`, error);
      this.sendError(res, 500, 'Internal server error');
    }
  }

  private handleHealthCheck(res: http.ServerResponse): void {
    const health = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: API_VERSION
    };

    this.sendJson(res, 200, health);
  }

  private async handleBatchQuery(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const parsed = this.controller.parseRequestBody(await this.parseRequestBody(req));
    if (!parsed.ok) {
      this.sendError(res, 400, parsed.error);
      return;
    }

    const response = await this.controller.runBatch(parsed.input);
    if (response.statusCode !== 200) {
      console.warn(`${new Date().toISOString()} - Batch query rejected: ${response.body.error}`);
    }
    this.sendJson(res, response.statusCode, response.body);
  }

  private async handleStreamQuery(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const parsed = this.controller.parseRequestBody(await this.parseRequestBody(req));
    if (!parsed.ok) {
      this.sendError(res, 400, parsed.error);
      return;
    }

    // Errors found while building candidates are reported before the stream opens
    const preparation = await this.controller.prepareStream(parsed.input);
    if (!preparation.ok) {
      console.warn(`${new Date().toISOString()} - Stream query rejected: ${preparation.error}`);
      this.sendError(res, preparation.statusCode, preparation.error);
      return;
    }

    const channel = new NdjsonChannel(res);
    channel.open();
    const outcome = await this.controller.stream(preparation.candidates, channel);
    channel.close();

    const summary = `${outcome.completed}/${outcome.total} lookups`;
    if (outcome.reason) {
      console.warn(`${new Date().toISOString()} - Stream ${outcome.state} (${outcome.reason}) after ${summary}: ${outcome.detail ?? ''}`);
    } else {
      console.log(`${new Date().toISOString()} - Stream ${outcome.state} after ${summary}`);
    }
  }

  private async handleStaticFile(pathname: string, res: http.ServerResponse): Promise<void> {
    const file = await this.staticFiles.load(pathname);
    if (!file) {
      this.sendError(res, 404, 'File not found');
      return;
    }
    res.writeHead(200, { 'Content-Type': file.contentType, 'Content-Length': file.data.length });
    res.end(file.data);
  }

  private parseRequestBody(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      let body = '';
      req.setEncoding('utf8');
      req.on('data', (chunk: string) => {
        body += chunk;
      });
      req.on('end', () => {
        resolve(body);
      });
      req.on('error', reject);
    });
  }

  private sendJson(res: http.ServerResponse, statusCode: number, data: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json; charset=utf-8' });
    res.end(JSON.stringify(data, null, 2));
  }

  private sendError(res: http.ServerResponse, statusCode: number, message: string): void {
    if (res.headersSent) {
      // Mid-stream failure: the status line is gone, just drop the connection
      res.destroy();
      return;
    }
    this.sendJson(res, statusCode, { error: message });
  }

  /**
   * Port the server is bound to; differs from the configured port when that was 0
   */
  public getPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.server.once('error', onError);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', onError);
        const base = `http://${this.host}:${this.getPort()}`;
        console.log(`🚀 Domain query API server running on ${base}`);
        console.log(`📡 API Endpoints:`);
        console.log(`   GET  /api/health - Health check`);
        console.log(`   POST /domain-query/batch - Check all candidates, reply once`);
        console.log(`   POST /domain-query/batch-stream - Check candidates, stream NDJSON progress`);
        console.log(`   GET  /ui/domain-query - Web form`);
        console.log(`   GET  /swagger - Interactive API page`);
        console.log(`   GET  /swagger.json - OpenAPI document`);
        resolve();
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        console.log('API Server stopped');
        resolve();
      });
      this.server.closeAllConnections();
    });
  }
}
