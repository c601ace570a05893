export { encodePam, pamHeader } from "./pam-encoder.js";
export {
  EMPTY_CHAR,
  OTHER_CHAR,
  legendFor,
  legendForFrame,
  renderAscii,
  type LegendEntry,
} from "./ascii-preview.js";
