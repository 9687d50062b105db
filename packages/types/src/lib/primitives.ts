/**
 * @fileoverview Branded primitives for identifiers that cross component seams
 *
 * @module @vitalcheck/types/primitives
 */

declare const __brand: unique symbol;

/**
 * Generic branded type constructor
 * Creates nominal types that are structurally incompatible despite identical runtime values
 *
 * @example
 * type PatientId = Brand<string, 'PatientId'>;
 * type ActorId = Brand<string, 'ActorId'>;
 *
 * const actor: ActorId = patientId; // Compile error!
 */
export type Brand<T, TBrand extends string> = T & { readonly [__brand]: TBrand };

/**
 * Extracts the base type from a branded type
 */
export type Unbrand<T> = T extends Brand<infer U, string> ? U : T;

/** Primary key of the patients table */
export type PatientId = Brand<string, 'PatientId'>;

/** Primary key of the users table, recorded as the actor of an audit entry */
export type ActorId = Brand<string, 'ActorId'>;

/** Primary key of the providers table */
export type ProviderId = Brand<string, 'ProviderId'>;

/**
 * Ciphertext token produced by the SecurityHelper.
 * Opaque to everything except the process holding the matching key.
 */
export type EncryptedBlob = Brand<string, 'EncryptedBlob'>;

export function patientId(value: string): PatientId {
  return value as PatientId;
}

export function actorId(value: string): ActorId {
  return value as ActorId;
}

export function providerId(value: string): ProviderId {
  return value as ProviderId;
}

export function encryptedBlob(value: string): EncryptedBlob {
  return value as EncryptedBlob;
}
