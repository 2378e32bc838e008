/**
 * OpenAPI descriptor source
 *
 * Adapts an OpenAPI 3 (or Swagger 2.0) document to the descriptor boundary.
 * The document is loaded once, on first use.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type {
  DescriptorSource,
  RawRouteDescriptor,
  RawSchemaDescriptor,
} from '../ir/descriptors.js';
import { parseOpenApiDocument } from '../parsers/openapi-parser.js';
import { RouteExtractor } from '../parsers/route-parser.js';
import { SchemaConverter } from '../parsers/schema-parser.js';

export class OpenApiDescriptorSource implements DescriptorSource {
  private document: Promise<OpenAPIV3.Document> | null = null;

  /**
   * @param input - Path to a `.json`, `.yaml` or `.yml` document, or a parsed document
   */
  constructor(private readonly input: string | object) {}

  /**
   * @throws {DescriptorSourceError} When the document cannot be loaded
   */
  load(): Promise<OpenAPIV3.Document> {
    if (this.document === null) {
      const loading = parseOpenApiDocument(this.input);
      // A failed load is retried on the next call
      loading.catch(() => {
        if (this.document === loading) this.document = null;
      });
      this.document = loading;
    }
    return this.document;
  }

  async enumerateRoutes(): Promise<RawRouteDescriptor[]> {
    const document = await this.load();
    return new RouteExtractor(document).extract();
  }

  async enumerateSchemas(): Promise<RawSchemaDescriptor[]> {
    const document = await this.load();
    return new SchemaConverter(document).componentRecords();
  }
}
