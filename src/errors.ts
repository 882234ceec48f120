/**
 * Reverse mapping errors
 * Every error aborts the whole run; nothing is retried.
 */

import { QualifiedName, showQualifiedName } from './db-schema-types.js';

export class ReverseMappingError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ReverseMappingError';
  }
}

export class DanglingReferenceError extends ReverseMappingError {
  constructor(
    public readonly table: QualifiedName,
    cause?: Error
  ) {
    super(`Reference to ${showQualifiedName(table)} not found`, cause);
    this.name = 'DanglingReferenceError';
  }
}

export class AmbiguousColumnReferenceError extends ReverseMappingError {
  constructor(
    public readonly table: QualifiedName,
    public readonly column: string,
    referenceCount: number
  ) {
    super(
      `Column ${column} in table ${showQualifiedName(table)} participates in ${referenceCount} references`
    );
    this.name = 'AmbiguousColumnReferenceError';
  }
}

export class MultipleAutoKeysError extends ReverseMappingError {
  constructor(
    public readonly table: QualifiedName,
    public readonly columns: string[]
  ) {
    super(`More than one autoincremented column for ${showQualifiedName(table)}: ${columns.join(', ')}`);
    this.name = 'MultipleAutoKeysError';
  }
}

export class EmptyUniqueCandidateSetError extends ReverseMappingError {
  constructor(public readonly table: QualifiedName) {
    super(`Uniques list for ${showQualifiedName(table)} must not be empty`);
    this.name = 'EmptyUniqueCandidateSetError';
  }
}

export class NotFoundInCollectionError extends ReverseMappingError {
  constructor(
    public readonly what: string,
    public readonly key: string
  ) {
    super(`Cannot find ${what} ${key}`);
    this.name = 'NotFoundInCollectionError';
  }
}

/**
 * Find the single element with the given key
 */
export function findOne<T>(what: string, keyOf: (item: T) => string, key: string, items: T[]): T {
  const found = items.find(item => keyOf(item) === key);
  if (found === undefined) {
    throw new NotFoundInCollectionError(what, key);
  }
  return found;
}

export class SchemaAnalysisError extends ReverseMappingError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'SchemaAnalysisError';
  }
}
