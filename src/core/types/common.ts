export type MediaKind = "image" | "video";
export type GeneratorState = "idle" | "awaiting-response";
