import { NodeSDK } from "@opentelemetry/sdk-node";
import { LangfuseSpanProcessor } from "@langfuse/otel";
import { startObservation, propagateAttributes } from "@langfuse/tracing";
import { debug } from "./logger.js";
import type { LangfuseConfig } from "./config.js";
import type { DetailLevel } from "./types.js";

export interface Tracing {
  shutdown(): Promise<void>;
}

/** Starts exporting spans to Langfuse. Call `shutdown` before exit. */
export function startTracing(config: LangfuseConfig): Tracing {
  const spanProcessor = new LangfuseSpanProcessor({
    exportMode: "immediate",
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });

  const sdk = new NodeSDK({
    spanProcessors: [spanProcessor],
  });

  sdk.start();
  debug("Langfuse tracing started");

  return {
    async shutdown() {
      await spanProcessor.forceFlush();
      await sdk.shutdown();
    },
  };
}

/** Runs `fn` with every observation it creates tagged with the session id. */
export async function withSessionTrace<T>(
  sessionId: string,
  fn: () => Promise<T>,
): Promise<T> {
  return propagateAttributes({ sessionId }, fn);
}

export interface SummaryGenerationInput {
  model: string;
  systemPrompt: string;
  prompt: string;
  detailLevel: DetailLevel;
  sessionId: string;
}

export interface SummaryGenerationOutput {
  summary: string;
  error?: string;
  inputTokens?: number;
  outputTokens?: number;
}

export interface SummaryGeneration {
  end(output: SummaryGenerationOutput): void;
}

export function startSummaryGeneration(
  input: SummaryGenerationInput,
): SummaryGeneration {
  const generation = startObservation(
    `summarize-turn-${input.detailLevel}`,
    {
      model: input.model,
      input: [
        { role: "system", content: input.systemPrompt },
        { role: "user", content: input.prompt },
      ],
      metadata: { detail_level: input.detailLevel, session_id: input.sessionId },
    },
    { asType: "generation" },
  );

  return {
    end(output) {
      const hasUsage =
        output.inputTokens !== undefined || output.outputTokens !== undefined;
      generation
        .update({
          output: { role: "assistant", content: output.summary },
          ...(output.error !== undefined && {
            level: "ERROR" as const,
            statusMessage: output.error,
          }),
          ...(hasUsage && {
            usageDetails: {
              input: output.inputTokens ?? 0,
              output: output.outputTokens ?? 0,
            },
          }),
        })
        .end();
      debug(`Created summary generation for session ${input.sessionId}`);
    },
  };
}
