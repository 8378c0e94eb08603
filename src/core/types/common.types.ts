/**
 * @fileoverview Core generic utility types
 * @module core/types/common
 */

/**
 * Branded type for nominal typing
 * @template T - The base type
 * @template TBrand - The brand identifier
 */
export type Brand<T, TBrand extends string> = T & { readonly __brand: TBrand };

/**
 * Result type for error handling (Either monad)
 * @template TData - Success data type
 * @template TError - Error type
 */
export type Result<TData, TError = Error> =
  | { success: true; data: TData }
  | { success: false; error: TError };

export function ok<TData>(data: TData): { success: true; data: TData } {
  return { success: true, data };
}

export function fail<TError>(error: TError): { success: false; error: TError } {
  return { success: false, error };
}
