/***
 * Brand — Nominal wrappers over primitive ids.
 *
 * EntityID and ComponentID are plain numbers at runtime. Branding them
 * with a phantom symbol keeps an entity id from being passed where a
 * component kind id is expected, and vice versa.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
