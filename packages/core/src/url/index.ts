export { parseStreamUrl, urlParse, type StreamUrl } from "./parse.js";
