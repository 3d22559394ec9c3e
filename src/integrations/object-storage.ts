/**
 * Resolves stored file paths (profile pictures, client icons) to URLs
 */
export interface IObjectStorage {
  resolveUrl(path: string): string;
}

/**
 * Files served from a public bucket or CDN under a fixed base URL
 */
export class PublicBucketStorage implements IObjectStorage {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  }

  resolveUrl(path: string): string {
    return new URL(path.replace(/^\/+/, ''), this.baseUrl).toString();
  }
}
