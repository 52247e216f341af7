import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { JobKind } from '@clm/database';
import type {
  JobContext,
  JobHandler,
  JobResult,
} from '../../src/jobs/interfaces/job-handler.interface';

export class EchoParameters {
  @IsString()
  @IsNotEmpty()
  message!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  delayMs?: number;
}

type EchoBehaviour = (parameters: EchoParameters, context: JobContext) => Promise<JobResult>;

/**
 * Test handler registered under a real job kind. Echoes `message` back by
 * default; tests swap `behaviour` to make it fail or hang.
 */
export class EchoJobHandler implements JobHandler<EchoParameters> {
  readonly parametersType = EchoParameters;
  readonly calls: Array<{ parameters: EchoParameters; context: JobContext }> = [];

  behaviour: EchoBehaviour = async (parameters) => ({ echoed: parameters.message });

  constructor(readonly kind: JobKind = JobKind.AI_GENERATION) {}

  run(parameters: EchoParameters, context: JobContext): Promise<JobResult> {
    this.calls.push({ parameters, context });
    return this.behaviour(parameters, context);
  }
}

/** Resolves when `signal` aborts; never rejects. */
export function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
