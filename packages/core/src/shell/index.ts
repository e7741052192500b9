export { shellQuote } from "./quote.js";
