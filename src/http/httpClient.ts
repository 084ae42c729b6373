import axios, { type AxiosInstance } from 'axios';
import { logger } from '../util/logger.js';

/**
 * What the converter needs from the network. Non-2xx responses and transport
 * errors reject.
 */
export interface HttpFetcher {
  getText(url: string): Promise<string>;
  getBuffer(url: string): Promise<Buffer>;
}

export interface HttpClientConfig {
  /** 0 disables the timeout. */
  timeoutMs: number;
  userAgent?: string;
}

export class HttpClient implements HttpFetcher {
  private client: AxiosInstance;

  constructor(config: HttpClientConfig) {
    this.client = axios.create({
      timeout: config.timeoutMs,
      headers: {
        'User-Agent': config.userAgent ?? 'zds-to-grav/1.0.0'
      }
    });

    this.client.interceptors.response.use(
      (response) => {
        const data: unknown = response.data;
        logger.debug('HTTP response', {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          size: typeof data === 'string' || Buffer.isBuffer(data) ? data.length : undefined
        });
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          logger.debug('HTTP error', {
            method: error.config?.method?.toUpperCase(),
            url: error.config?.url,
            status: error.response?.status,
            message: error.message
          });
        }
        return Promise.reject(error);
      }
    );
  }

  async getText(url: string): Promise<string> {
    const response = await this.client.get<string>(url, { responseType: 'text' });
    return response.data;
  }

  async getBuffer(url: string): Promise<Buffer> {
    const response = await this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    return Buffer.from(response.data);
  }
}
