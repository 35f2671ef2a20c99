export * from "./hkt";
export * from "./typeclasses";
export * from "./generic";
