declare const brand: unique symbol

/** Nominal type over a primitive, e.g. `Brand<string, "ProductId">`. */
export type Brand<T, B extends string> = T & { readonly [brand]: B }
