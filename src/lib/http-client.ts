import * as fs from 'fs';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { TIMEOUTS, USER_AGENT } from '../shared-constants';

/**
 * Transport seen by the resolver and the fetcher. Non-2xx answers come back
 * as a status; only transport failures (DNS, reset, timeout) throw.
 */
export interface HttpClient {
  getJson(url: string): Promise<HttpResponse<unknown>>;
  getStatus(url: string): Promise<number>;
  download(url: string, destPath: string): Promise<number>;
}

export interface HttpResponse<T> {
  status: number;
  data: T;
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

function describeAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'request timed out';
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export class AxiosHttpClient implements HttpClient {
  private readonly http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        headers: { 'User-Agent': USER_AGENT },
        maxRedirects: 5,
        validateStatus: () => true
      });
  }

  async getJson(url: string): Promise<HttpResponse<unknown>> {
    try {
      const response = await this.http.get<unknown>(url, {
        timeout: TIMEOUTS.INDEX_REQUEST_MS,
        responseType: 'json',
        headers: { Accept: 'application/vnd.github+json' }
      });
      return { status: response.status, data: response.data };
    } catch (error) {
      throw new TransportError(`GET ${url} failed: ${describeAxiosError(error)}`, url, toOptionalError(error));
    }
  }

  async getStatus(url: string): Promise<number> {
    try {
      const response = await this.http.get<Readable>(url, {
        timeout: TIMEOUTS.INDEX_REQUEST_MS,
        responseType: 'stream'
      });
      response.data.destroy();
      return response.status;
    } catch (error) {
      throw new TransportError(`GET ${url} failed: ${describeAxiosError(error)}`, url, toOptionalError(error));
    }
  }

  /**
   * Streams the body to destPath only for a 200; partial files are removed
   */
  async download(url: string, destPath: string): Promise<number> {
    let response: AxiosResponse<Readable>;
    try {
      response = await this.http.get<Readable>(url, {
        timeout: TIMEOUTS.DOWNLOAD_MS,
        responseType: 'stream'
      });
    } catch (error) {
      throw new TransportError(`GET ${url} failed: ${describeAxiosError(error)}`, url, toOptionalError(error));
    }

    if (response.status !== 200) {
      response.data.destroy();
      return response.status;
    }

    try {
      await pipeline(response.data, fs.createWriteStream(destPath));
    } catch (error) {
      await fs.promises.rm(destPath, { force: true });
      throw new TransportError(`Download of ${url} interrupted: ${describeAxiosError(error)}`, url, toOptionalError(error));
    }
    return response.status;
  }
}

function toOptionalError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
