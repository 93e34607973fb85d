/**
 * Shared type utilities.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings only. */
  minLength?: number;
  maxLength?: number;
  enum?: string[];
  /** Numbers only. */
  min?: number;
  max?: number;
}

/** Field name → constraints, checked by the validateBody middleware. */
export type BodySchema = Record<string, FieldSchema>;
