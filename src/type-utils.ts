/**
 * Type utilities shared across the expression builder and stages
 */

import type * as tf from "type-fest";

export type Dict<T> = Record<string, T>;

/**
 * Keys of `Base` whose values are methods returning `Base` itself, i.e. the
 * chainable part of a fluent API.
 */
export type ChainableKeys<Base> = tf.ConditionalKeys<Base, (...args: never[]) => Base>;

// Parameters of a chainable method, keeping the labels of the original signature
export type ChainableArgs<Base, K extends keyof Base> =
  Base[K] extends (...args: infer A extends unknown[]) => Base ? A : never;
