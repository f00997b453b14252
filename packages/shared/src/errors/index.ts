export { ErrorCode, isUserError } from "./codes.js";
