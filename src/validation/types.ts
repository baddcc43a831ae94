import type { Pipeline } from '../../packages/pipeline-engine/src/index.js';
import type { RuntimeConfig } from '../config/loader.js';

export interface ValidationResult {
  passed: boolean;
  warnings: string[];
  errors: string[];
  name?: string;
}

/** What every validator sees. `pipeline` is null when the manifest failed to load. */
export interface ValidationContext {
  config: RuntimeConfig;
  pipeline: Pipeline | null;
  manifestError?: string;
}

export interface PreRunValidator {
  name: string;
  validate(ctx: ValidationContext): Promise<ValidationResult>;
}
