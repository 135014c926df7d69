export { decodeSegment, joinPaths, normalizePath, splitPath } from "./path";
export { type MatchResult, PathMatcher, type RegisteredPattern } from "./path-matcher";
export { parsePattern, type PathPattern, type Segment } from "./pattern";
export { RadixTree } from "./radix-tree";
