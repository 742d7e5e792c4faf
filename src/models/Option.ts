/*
 * SPDX-License-Identifier: Apache-2.0
 */

// Present/absent values stored on world-state records. Serializes as plain JSON.
export type Option<T> =
    | { readonly kind: 'some'; readonly value: T }
    | { readonly kind: 'none' };

export const none: Option<never> = { kind: 'none' };

export function some<T>(value: T): Option<T> {
    return { kind: 'some', value };
}

export function isSome<T>(option: Option<T>): option is { readonly kind: 'some'; readonly value: T } {
    return option.kind === 'some';
}

export function contains<T>(option: Option<T>, value: T): boolean {
    return option.kind === 'some' && option.value === value;
}
