export * from "./types.js";
export { GraphDelta, NoteGraph, mergeDeltas, targetKeyOf, unresolvedKey } from "./noteGraph.js";
export { buildNoteDelta, buildNoteGraph, resolveReference } from "./builder.js";
export type { BindOptions } from "./builder.js";
