export { canonicalize, hasLetters } from "./canonicalize.js";
export { PrefixIndex } from "./prefix-index.js";
export { NameIndex } from "./name-index.js";
