// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Position = Brand<number, "Position">;
export type InputSize = Brand<number, "InputSize">;
export type Seed = Brand<number, "Seed">;

export const asPosition = (n: number): Position => n as Position;
export const asInputSize = (n: number): InputSize => n as InputSize;
export const asSeed = (n: number): Seed => n as Seed;
