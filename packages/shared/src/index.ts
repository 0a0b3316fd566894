export * from "./types/palette";
