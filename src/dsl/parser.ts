/**
 * Specification text format.
 *
 * Documents are YAML (.yaml/.yml) or JSON (.json). serializeSpec emits a
 * canonical form: parsing it again yields a document deep-equal to the one
 * serialized.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { StrataError, createTypedError } from '../domain/errors';
import { ProvisioningSpec } from '../domain/step';
import { ValidationResult, validateSpec } from './validator';

export type SpecFormat = 'yaml' | 'json';

/** Infer the document format from a file name. YAML unless it ends in .json. */
export function formatForPath(filePath: string): SpecFormat {
  return path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

/**
 * Parse specification text into an unvalidated document.
 *
 * @throws StrataError (VALIDATION.SYNTAX) when the text is not well-formed
 */
export function parseDocument(text: string, format: SpecFormat = 'yaml'): unknown {
  try {
    return format === 'json' ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    throw new StrataError(
      createTypedError({
        code: 'VALIDATION.SYNTAX',
        message: `Could not parse ${format.toUpperCase()}: ${err instanceof Error ? err.message : String(err)}`,
      }),
    );
  }
}

/** Parse and validate specification text. */
export function parseSpec(text: string, format: SpecFormat = 'yaml'): ValidationResult {
  let document: unknown;
  try {
    document = parseDocument(text, format);
  } catch (err) {
    if (!(err instanceof StrataError)) throw err;
    return { valid: false, warnings: [], errors: [err.typedError] };
  }
  return validateSpec(document);
}

/** Serialize a specification in canonical field order. */
export function serializeSpec(spec: ProvisioningSpec, format: SpecFormat = 'yaml'): string {
  const canonical = toCanonical(spec);
  if (format === 'json') {
    return `${JSON.stringify(canonical, null, 2)}\n`;
  }
  return stringifyYaml(canonical);
}

/** Read and validate a specification file. */
export async function loadSpecFile(filePath: string): Promise<ValidationResult> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      warnings: [],
      errors: [
        createTypedError({
          code: 'VALIDATION.UNREADABLE',
          message: `Cannot read specification ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        }),
      ],
    };
  }
  return parseSpec(text, formatForPath(filePath));
}

function toCanonical(spec: ProvisioningSpec): Record<string, unknown> {
  return {
    specVersion: spec.specVersion,
    name: spec.name,
    ...(spec.description !== undefined ? { description: spec.description } : {}),
    ...(spec.pathSeparator !== undefined ? { pathSeparator: spec.pathSeparator } : {}),
    steps: spec.steps.map((step) => ({
      id: step.id,
      kind: step.kind,
      ...(step.description !== undefined ? { description: step.description } : {}),
      params: { ...step.params },
      ...(step.requires.length > 0 ? { requires: [...step.requires] } : {}),
    })),
  };
}
