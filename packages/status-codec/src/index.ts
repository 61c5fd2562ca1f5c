/**
 * @lightbench/status-codec
 *
 * Light status table, compact record stencil and CBOR codec shared by every
 * protocol variant.
 */

export {
  LIGHT_STATUSES,
  isLightStatus,
  lookupCodeForStatus,
  statusForCode,
  randomLightStatus,
  type LightStatus,
  type StatusEnvelope,
} from "./light-status.ts";

export {
  compileTemplate,
  CAR_STATUS_LAYOUT,
  DEFAULT_TEMPLATE,
  FETCH_SID,
  NAME_PLACEHOLDER,
  CODE_PLACEHOLDER,
  type CompactRecord,
  type CompactValue,
  type CompiledTemplate,
  type TemplateLayout,
} from "./template.ts";

export { encode, encodeStatus, encodeCompact, decode } from "./codec.ts";

export {
  buildStatusDocument,
  parseStatusDocument,
  type StatusDocument,
} from "./document.ts";

export { UnknownStatusError, DecodeError, TemplateError } from "./errors.ts";
