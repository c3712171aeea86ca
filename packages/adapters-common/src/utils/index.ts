export { sanitizeRoleSessionName } from "./sanitize";
