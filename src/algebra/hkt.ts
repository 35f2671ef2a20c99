import type { Future } from "../future/future";

/**
 * Registry of the containers typeclass instances can be written for, keyed by URI
 */
export interface URItoKind<A> {
  readonly Future: Future<A>;
}

export type URIS = keyof URItoKind<unknown>;

/**
 * The container registered under F, holding values of type A
 */
export type Kind<F extends URIS, A> = URItoKind<A>[F];
