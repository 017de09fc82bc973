import pc from 'picocolors';
import { MAIN_CODE, type GenerationResult } from '@synthloop/core';
import type { EventBus, PipelineEvent } from '@synthloop/shared';

/**
 * Prints pipeline progress as it happens. Silent in JSON mode so stdout
 * carries a single JSON document.
 */
export class ProgressRenderer implements EventBus {
  constructor(private isJson: boolean) {}

  emit(event: PipelineEvent): void {
    if (this.isJson) return;

    switch (event.type) {
      case 'RunStarted':
        console.log(pc.bold(`Task: ${event.payload.task}`));
        break;
      case 'SignatureGenerated':
        console.log(`\n${pc.bold('Generated code signature:')}\n${event.payload.codeSignature}`);
        break;
      case 'CodeGenerated':
        console.log(`\n${pc.bold('Generated code:')}\n${event.payload.code}`);
        break;
      case 'TestsGenerated':
        console.log(`\n${pc.bold('Generated tests:')}`);
        for (const test of event.payload.tests) {
          console.log(`${pc.cyan(test.name)}: ${test.source}`);
        }
        break;
      case 'ExecutionFinished':
        this.renderExecution(event.payload);
        break;
      case 'RepairAttempted':
        console.log(pc.yellow('Re-generating the code with the execution feedback...'));
        break;
      case 'CodeRepaired':
        console.log(`\n${pc.bold(`Fixed code (repair ${event.payload.iteration}):`)}\n${event.payload.code}`);
        break;
      default:
        break;
    }
  }

  private renderExecution(payload: {
    artifact: string;
    success: boolean;
    error?: string;
  }): void {
    const isMain = payload.artifact === MAIN_CODE;
    if (payload.success) {
      const label = isMain ? 'Code ran' : `Test ${payload.artifact} passed`;
      console.log(`${pc.green('✔')} ${label}`);
      return;
    }
    const label = isMain ? 'Code failed' : `Test ${payload.artifact} failed`;
    console.log(`${pc.red('✖')} ${label} with error: ${payload.error ?? 'unknown error'}`);
  }
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(result: GenerationResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      this.renderSuccess(result);
    }
  }

  private renderSuccess(result: GenerationResult): void {
    console.log(`\n${pc.green(pc.bold('All generated tests passed'))}`);
    console.log(`  Repairs: ${result.repairIterations}`);
    console.log(`  Duration: ${(result.durationMs / 1000).toFixed(1)}s`);
    console.log(pc.gray(`  Run ID: ${result.runId}`));
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}
