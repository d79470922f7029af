/**
 * Structured output contracts
 *
 * A contract pairs a zod schema with the JSON schema the model is asked to
 * follow. Whatever comes back is parsed against the zod schema; anything
 * that does not fit raises SchemaValidationError.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Message } from './base.js';
import { SchemaValidationError } from '../utils/errors.js';

export interface OutputContract<S extends z.ZodTypeAny> {
  name: string;
  schema: S;
  jsonSchema(): object;
  parse(value: unknown): z.infer<S>;
}

export function defineContract<S extends z.ZodTypeAny>(name: string, schema: S): OutputContract<S> {
  let cached: object | undefined;

  return {
    name,
    schema,
    jsonSchema() {
      if (!cached) {
        cached = zodToJsonSchema(schema, { $refStrategy: 'none' });
      }
      return cached;
    },
    parse(value: unknown) {
      const result = schema.safeParse(value);
      if (!result.success) {
        const issues = result.error.issues.map(
          (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
        );
        throw new SchemaValidationError(
          `Model output does not match ${name}: ${issues.join('; ')}`,
          name,
          issues
        );
      }
      return result.data;
    },
  };
}

/**
 * query(conversation, contract) -> validated object.
 */
export interface StructuredModel {
  query<S extends z.ZodTypeAny>(messages: readonly Message[], contract: OutputContract<S>): Promise<z.infer<S>>;
}
