export * from "./protocols";
export * from "./engine";
export * from "./future";
export * from "./construct";
export * from "./inspect";
export * from "./combinators";
export * from "./callback";
export * from "./monad";
