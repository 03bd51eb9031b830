/**
 * Shared utility types.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  /** Accepted JSON types; more than one when a field takes alternative shapes. */
  type: FieldType | FieldType[];
  required?: boolean;
  minLength?: number;
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: readonly string[];
  /** Element type check for arrays. */
  items?: 'string' | 'number';
}

export interface BodySchema {
  fields: Record<string, FieldSchema>;
  /** Each group requires at least one of its fields to be a non-empty value. */
  oneOf?: string[][];
}
