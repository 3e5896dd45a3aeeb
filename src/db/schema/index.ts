export * from "./common";
export * from "./books";
