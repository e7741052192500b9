export { replaceString } from "./replace.js";
export { compareSuffix, compareSuffixIgnoreCase } from "./suffix.js";
