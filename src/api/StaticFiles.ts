import path from 'path';
import { readFile } from 'fs/promises';

/**
 * Public path -> file name and content type under the static directory
 */
export const STATIC_ROUTES: Readonly<Record<string, { file: string; contentType: string }>> = {
  '/ui/domain-query': { file: 'domain_query_ui.html', contentType: 'text/html; charset=utf-8' },
  '/swagger': { file: 'swagger.html', contentType: 'text/html; charset=utf-8' },
  '/swagger.json': { file: 'swagger.json', contentType: 'application/json; charset=utf-8' }
};

/**
 * Read-only access to the bundled UI pages and API document
 */
export class StaticFiles {
  constructor(private readonly rootDir: string) {}

  /**
   * Whether a request path maps to a static file
   */
  has(pathname: string): boolean {
    return Object.prototype.hasOwnProperty.call(STATIC_ROUTES, pathname);
  }

  /**
   * Load the file behind a route
   * @param pathname - Request path
   * @returns File bytes and content type, or null when the route or file is missing
   */
  async load(pathname: string): Promise<{ data: Buffer; contentType: string } | null> {
    const route = this.has(pathname) ? STATIC_ROUTES[pathname] : undefined;
    if (!route) {
      return null;
    }

    try {
      const data = await readFile(path.join(this.rootDir, route.file));
      return { data, contentType: route.contentType };
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
