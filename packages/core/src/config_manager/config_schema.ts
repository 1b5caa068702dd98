import type { SchemaObject } from 'ajv';

const stringList = { type: 'array', items: { type: 'string', minLength: 1 } };

/**
 * JSON Schema for `.dcoguard.yml`. Unknown keys are rejected so typos in
 * policy names surface instead of silently keeping a default.
 */
export const CONFIG_SCHEMA: SchemaObject = {
  $id: 'https://dcoguard.dev/schemas/config.json',
  type: 'object',
  additionalProperties: false,
  properties: {
    signoff: {
      type: 'object',
      additionalProperties: false,
      properties: {
        caseInsensitiveEmail: { type: 'boolean' },
        allowMergeCommitsWithoutSignoff: { type: 'boolean' },
        requireExactAuthorMatch: { type: 'boolean' },
        acceptCoAuthorSignoffs: { type: 'boolean' },
        allowEmptyRange: { type: 'boolean' },
      },
    },
    headers: {
      type: 'object',
      additionalProperties: false,
      properties: {
        licenseId: { type: 'string', pattern: '^[A-Za-z0-9.+-]+( (AND|OR|WITH) [A-Za-z0-9.+-]+)*$' },
        copyrightNotice: { type: 'string', minLength: 1 },
        searchLines: { type: 'integer', minimum: 1 },
        commentPrefixes: {
          type: 'object',
          propertyNames: { type: 'string', pattern: '^\\.[A-Za-z0-9]+$' },
          additionalProperties: { type: 'string', minLength: 1 },
        },
        include: stringList,
        exclude: stringList,
      },
    },
  },
};
