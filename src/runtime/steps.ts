/**
 * Step Inspector
 *
 * Read-only view of what the service did during a completed run.
 * Tool-call metadata is passed through exactly as the service recorded it.
 */

import type { RemoteExecutor, Run, RunStep, StepToolCall } from "../client/types.js";
import { PrematureInspectionError } from "./errors.js";

/**
 * A tool call together with the step that recorded it.
 */
export interface InspectedToolCall {
  stepId: string;
  toolCall: StepToolCall;
}

export class StepInspector {
  constructor(private readonly executor: RemoteExecutor) {}

  /**
   * Steps of a completed run, in execution order, fetched page by page.
   *
   * @throws PrematureInspectionError on first iteration if the run is not completed
   */
  async *steps(run: Run): AsyncGenerator<RunStep, void, undefined> {
    if (run.status !== "completed") {
      throw new PrematureInspectionError(run.status, run.id);
    }

    let after: string | undefined;
    for (;;) {
      const page = await this.executor.listRunSteps(run.threadId, run.id, after === undefined ? {} : { after });
      yield* page.steps;

      if (!page.hasMore || page.lastId === undefined || page.lastId === after) {
        return;
      }
      after = page.lastId;
    }
  }

  async collect(run: Run): Promise<RunStep[]> {
    const steps: RunStep[] = [];
    for await (const step of this.steps(run)) {
      steps.push(step);
    }
    return steps;
  }

  /**
   * Every tool call recorded on the run's steps, in order.
   */
  async toolCalls(run: Run): Promise<InspectedToolCall[]> {
    const calls: InspectedToolCall[] = [];
    for await (const step of this.steps(run)) {
      for (const toolCall of step.toolCalls) {
        calls.push({ stepId: step.id, toolCall });
      }
    }
    return calls;
  }
}
