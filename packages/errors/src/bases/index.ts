export { InternalError } from "./internal-error.js";
