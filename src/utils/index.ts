export * from "./TextNormalizer";
