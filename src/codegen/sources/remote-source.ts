/**
 * Remote descriptor source
 *
 * Fetches the OpenAPI document from a running backend and hands it to
 * {@link OpenApiDescriptorSource}. Every `refresh()` fetches a new snapshot,
 * which is what watch mode needs after the backend reloads.
 */

import xior from 'xior';
import type { XiorError, XiorInstance } from 'xior';
import errorRetryPlugin from 'xior/plugins/error-retry';
import { getBackendUrl, type GeneratorConfig } from '../../config.js';
import { DescriptorSourceError, describeError } from '../../errors.js';
import { logData } from '../../logger.js';
import type {
  DescriptorSource,
  RawRouteDescriptor,
  RawSchemaDescriptor,
} from '../ir/descriptors.js';
import { OpenApiDescriptorSource } from './openapi-source.js';

export interface RemoteSourceOptions {
  /** Backend origin, e.g. `http://localhost:8000` */
  baseURL: string;
  /** Document path on the backend */
  openApiPath?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Retries while the backend is still starting */
  retries?: number;
  /** Delay between retries in milliseconds */
  retryInterval?: number;
  debug?: boolean;
}

export const DEFAULT_OPENAPI_PATH = '/openapi.json';

function isXiorError(error: unknown): error is XiorError {
  return error instanceof Error && 'request' in error;
}

export class RemoteDescriptorSource implements DescriptorSource {
  readonly client: XiorInstance;
  readonly baseURL: string;
  readonly openApiPath: string;
  private readonly debug: boolean;
  private snapshot: Promise<OpenApiDescriptorSource> | null = null;

  constructor(options: RemoteSourceOptions) {
    this.baseURL = options.baseURL;
    this.openApiPath = options.openApiPath ?? DEFAULT_OPENAPI_PATH;
    this.debug = options.debug ?? false;

    const client = xior.create({
      baseURL: options.baseURL,
      timeout: options.timeout ?? 10000,
    });

    const retries = options.retries ?? 0;
    if (retries > 0) {
      client.plugins.use(
        errorRetryPlugin({
          retryTimes: retries,
          retryInterval: options.retryInterval ?? 500,
        })
      );
    }

    this.client = client;
  }

  /**
   * Source for the backend configured under `backend`
   */
  static fromConfig(
    config: GeneratorConfig,
    options: Omit<RemoteSourceOptions, 'baseURL'> = {}
  ): RemoteDescriptorSource {
    return new RemoteDescriptorSource({ ...options, baseURL: getBackendUrl(config) });
  }

  /**
   * Drop the cached document; the next enumeration fetches a new one
   */
  refresh(): void {
    this.snapshot = null;
  }

  /**
   * @throws {DescriptorSourceError} When the backend is unreachable, answers
   * with an error status or returns something that is not a JSON document
   */
  async fetchDocument(): Promise<object> {
    const url = `${this.baseURL}${this.openApiPath}`;

    let data: unknown;
    try {
      const response = await this.client.get<unknown>(this.openApiPath);
      data = response.data;
    } catch (error) {
      const status = isXiorError(error) ? error.response?.status : undefined;
      throw new DescriptorSourceError(
        `Failed to fetch API document from ${url}: ${describeError(error)}`,
        status === undefined ? { url } : { url, status },
        error
      );
    }

    if (this.debug) {
      logData(`GET ${url} : response.data`, data);
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new DescriptorSourceError(`Response from ${url} is not an API document`, { url });
    }
    return data;
  }

  private source(): Promise<OpenApiDescriptorSource> {
    if (this.snapshot === null) {
      const fetching = this.fetchDocument().then(document => new OpenApiDescriptorSource(document));
      fetching.catch(() => {
        if (this.snapshot === fetching) this.snapshot = null;
      });
      this.snapshot = fetching;
    }
    return this.snapshot;
  }

  async enumerateRoutes(): Promise<RawRouteDescriptor[]> {
    return (await this.source()).enumerateRoutes();
  }

  async enumerateSchemas(): Promise<RawSchemaDescriptor[]> {
    return (await this.source()).enumerateSchemas();
  }
}
