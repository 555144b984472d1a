/**
 * Profiler module types
 */

import type { FileProfile } from "../../types/data-model.js";

export interface ProfilerMetadata {
  recordsAnalyzed: number;
  fieldsProfiled: number;
  truncatedFields: number;
}

export interface ProfilerResult {
  profile: FileProfile;
  metadata: ProfilerMetadata;
}
