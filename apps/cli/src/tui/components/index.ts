export { printHeader } from "./header.js";
