/**
 * Generator module types
 */

import type { TypesmithError } from "../../utils/errors.js";
import type { TargetName } from "../renderers/types.js";

export type TargetOutcome =
  | { ok: true; target: TargetName; source: string }
  | { ok: false; target: TargetName; error: TypesmithError };
