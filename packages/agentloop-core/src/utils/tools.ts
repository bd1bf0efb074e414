import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { UserError } from '../errors';
import type { JsonObjectSchema, JsonSchemaDefinition, TextOutput } from '../types';
import { isRecord, isZodObject } from './typeGuards';

/**
 * Parameters a function tool accepts: a Zod object that parses and validates the arguments, or a
 * JSON schema whose arguments are passed through after `JSON.parse`.
 */
export type ToolInputParameters = z.AnyZodObject | JsonObjectSchema;

/**
 * The output an agent is expected to produce.
 */
export type AgentOutputType = TextOutput | z.AnyZodObject | JsonSchemaDefinition;

export function hasJsonSchemaObjectShape(
  value: unknown,
): value is JsonObjectSchema {
  return (
    isRecord(value) && value.type === 'object' && isRecord(value.properties)
  );
}

function buildJsonSchemaFromZod(inputType: z.AnyZodObject): JsonObjectSchema {
  const schema = zodToJsonSchema(inputType, {
    target: 'jsonSchema7',
    $refStrategy: 'none',
  });
  if (!hasJsonSchemaObjectShape(schema)) {
    throw new UserError(
      'Unable to convert the provided Zod schema to a JSON Schema object.',
    );
  }
  const { $schema: _schema, ...rest } = schema;
  return rest;
}

/**
 * Convert a string to a function tool name by replacing spaces with underscores and
 * non-alphanumeric characters with underscores.
 * @param name - The name of the tool.
 * @returns The function tool name.
 */
export function toFunctionToolName(name: string): string {
  // Replace spaces with underscores
  name = name.replace(/\s/g, '_');

  // Replace non-alphanumeric characters with underscores
  name = name.replace(/[^a-zA-Z0-9]/g, '_');

  // Ensure the name is not empty
  if (name.length === 0) {
    throw new UserError('Tool name cannot be empty');
  }

  return name;
}

/**
 * Get the schema and parser from an input type. If the input type is a ZodObject, we will convert
 * it into a JSON Schema and use Zod as parser. If the input type is a JSON schema, we use the
 * JSON.parse function to get the parser.
 * @param inputType - The input type to get the schema and parser from.
 * @returns The schema and parser.
 */
export function getSchemaAndParserFromInputType(
  inputType: ToolInputParameters,
): {
  schema: JsonObjectSchema;
  parser: (input: string) => unknown;
} {
  if (isZodObject(inputType)) {
    return {
      schema: buildJsonSchemaFromZod(inputType),
      parser: (rawInput: string) => inputType.parse(JSON.parse(rawInput)),
    };
  }
  if (hasJsonSchemaObjectShape(inputType)) {
    return {
      schema: inputType,
      parser: (rawInput: string): unknown => JSON.parse(rawInput),
    };
  }

  throw new UserError('Input type is not a ZodObject or a valid JSON schema');
}

/**
 * Converts the agent output type provided to a serializable version
 */
export function convertAgentOutputTypeToSerializable(
  outputType: AgentOutputType,
): JsonSchemaDefinition | TextOutput {
  if (outputType === 'text') {
    return 'text';
  }

  if (isZodObject(outputType)) {
    return {
      type: 'json_schema',
      name: 'output',
      strict: true,
      schema: buildJsonSchemaFromZod(outputType),
    };
  }

  return outputType;
}
