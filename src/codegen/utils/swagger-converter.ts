/**
 * Swagger 2.0 to OpenAPI 3 conversion
 */

import type { OpenAPIV2, OpenAPIV3 } from 'openapi-types';
import { convertObj } from 'swagger2openapi';
import { DescriptorSourceError, describeError } from '../../errors.js';
import { logInfo } from '../../logger.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if a document is in Swagger 2.0 format
 */
export function isSwagger2(spec: unknown): spec is OpenAPIV2.Document {
  return isObject(spec) && spec.swagger === '2.0' && isObject(spec.paths);
}

/**
 * Check if a document is OpenAPI 3.x with the sections a client needs
 */
export function isOpenApi3(spec: unknown): spec is OpenAPIV3.Document {
  return (
    isObject(spec) &&
    typeof spec.openapi === 'string' &&
    spec.openapi.startsWith('3.') &&
    isObject(spec.info) &&
    isObject(spec.paths)
  );
}

/**
 * Convert a Swagger 2.0 document to OpenAPI 3
 *
 * @throws {DescriptorSourceError} When the conversion fails
 */
export async function convertSwagger2ToOpenAPI3(spec: OpenAPIV2.Document): Promise<OpenAPIV3.Document> {
  try {
    const result = await convertObj(spec, { patch: true, warnOnly: true });
    return result.openapi;
  } catch (error) {
    throw new DescriptorSourceError(
      `Failed to convert Swagger 2.0 to OpenAPI 3: ${describeError(error)}`,
      {},
      error
    );
  }
}

/**
 * Detect the document format and convert if necessary
 *
 * @throws {DescriptorSourceError} When the document is neither OpenAPI 3 nor Swagger 2.0
 */
export async function ensureOpenAPI3(spec: unknown): Promise<OpenAPIV3.Document> {
  if (isOpenApi3(spec)) {
    return spec;
  }

  if (isSwagger2(spec)) {
    logInfo('Detected Swagger 2.0 document, converting to OpenAPI 3');
    const converted = await convertSwagger2ToOpenAPI3(spec);
    if (isOpenApi3(converted)) {
      return converted;
    }
  }

  throw new DescriptorSourceError(
    'Invalid API document. Expected OpenAPI 3 or Swagger 2.0 with "info" and "paths" sections.'
  );
}
