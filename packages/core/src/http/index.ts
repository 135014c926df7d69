export { statusText } from "./status";
