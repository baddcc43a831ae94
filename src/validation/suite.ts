import type { Pipeline } from '../../packages/pipeline-engine/src/index.js';
import type { RuntimeConfig } from '../config/loader.js';
import { loadManifest } from '../manifest/parser.js';
import { CommandValidator } from './command-validator.js';
import { manifestValidator } from './manifest-validator.js';
import { shellValidator } from './shell-validator.js';
import type { PreRunValidator, ValidationContext, ValidationResult } from './types.js';

export interface SuiteResult {
  passed: boolean;
  warningCount: number;
  results: Map<string, ValidationResult>;
}

export class PreRunValidationSuite {
  constructor(
    private readonly validators: PreRunValidator[] = [shellValidator, manifestValidator, new CommandValidator()],
  ) {}

  async run(config: RuntimeConfig): Promise<SuiteResult> {
    const ctx = await this.buildContext(config);
    const results = new Map<string, ValidationResult>();
    let passed = true;
    let warningCount = 0;

    for (const validator of this.validators) {
      const result = await validator.validate(ctx);
      results.set(validator.name, result);
      if (!result.passed) {
        passed = false;
      }
      warningCount += result.warnings.length;
    }

    return { passed, warningCount, results };
  }

  formatResults(result: SuiteResult): string {
    const lines: string[] = [];

    for (const [name, vResult] of result.results) {
      let icon: string;
      if (!vResult.passed) {
        icon = '❌';
      } else if (vResult.warnings.length > 0) {
        icon = '⚠️';
      } else {
        icon = '✅';
      }
      lines.push(`${icon} ${name}`);
      for (const err of vResult.errors) {
        lines.push(`   Error: ${err}`);
      }
      for (const warn of vResult.warnings) {
        lines.push(`   Warning: ${warn}`);
      }
    }

    const status = result.passed ? 'PASS' : 'FAIL';
    const summary =
      result.warningCount > 0
        ? `${status} (${result.warningCount} warning${result.warningCount === 1 ? '' : 's'})`
        : status;
    lines.push(summary);

    return lines.join('\n');
  }

  private async buildContext(config: RuntimeConfig): Promise<ValidationContext> {
    let pipeline: Pipeline | null = null;
    let manifestError: string | undefined;
    try {
      pipeline = await loadManifest(config.manifestPath);
    } catch (err) {
      manifestError = err instanceof Error ? err.message : String(err);
    }
    return { config, pipeline, manifestError };
  }
}
