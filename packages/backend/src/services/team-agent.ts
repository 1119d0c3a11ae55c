import {
  BedrockAgentRuntimeClient,
  InvokeAgentCommand,
  type InvokeAgentCommandOutput,
  type Trace,
} from '@aws-sdk/client-bedrock-agent-runtime';
import type { AgentCitation, AgentTrace, JsonObject, TraceType } from '@team-builder/shared';
import { isJsonObject } from '@team-builder/shared';
import type { ServerConfig } from '../config.js';

/**
 * The part of the Bedrock runtime client the agent needs.
 * Tests pass an in-process fake.
 */
export interface AgentRuntimeTransport {
  send(command: InvokeAgentCommand): Promise<Pick<InvokeAgentCommandOutput, 'completion'>>;
}

export interface AgentResponse {
  completion: string;
  trace: AgentTrace;
  citations: AgentCitation[];
}

/**
 * Anything that can turn a prompt into a team composition
 */
export interface TeamAgentClient {
  invoke(sessionId: string, prompt: string): Promise<AgentResponse>;
}

export interface TeamAgentOptions {
  agentId: string;
  agentAliasId: string;
  enableTrace?: boolean;
}

export class AgentInvocationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentInvocationError';
  }
}

function toJsonObject(value: object): JsonObject {
  const parsed: unknown = JSON.parse(JSON.stringify(value));
  return isJsonObject(parsed) ? parsed : {};
}

function appendTrace(trace: AgentTrace, traceType: TraceType, entry: object): void {
  const entries = trace[traceType] ?? [];
  entries.push(toJsonObject(entry));
  trace[traceType] = entries;
}

/**
 * Sends prompts to a Bedrock agent and collects the streamed answer.
 *
 * The completion arrives as a stream of chunk and trace events. Chunk bytes
 * are decoded and joined into the answer text; citations attached to chunks
 * and trace parts are kept so the UI can show how the answer was produced.
 * A guardrail trace seen before any orchestration trace is filed as
 * pre-processing, later ones as post-processing.
 */
export class TeamAgent implements TeamAgentClient {
  constructor(
    private readonly transport: AgentRuntimeTransport,
    private readonly options: TeamAgentOptions
  ) {}

  async invoke(sessionId: string, prompt: string): Promise<AgentResponse> {
    const command = new InvokeAgentCommand({
      agentId: this.options.agentId,
      agentAliasId: this.options.agentAliasId,
      sessionId,
      inputText: prompt,
      enableTrace: this.options.enableTrace ?? true,
    });

    let response: Pick<InvokeAgentCommandOutput, 'completion'>;
    try {
      response = await this.transport.send(command);
    } catch (error) {
      console.error('[agent] Failed to invoke agent:', error);
      throw new AgentInvocationError(
        `Couldn't invoke agent: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (!response.completion) {
      throw new AgentInvocationError('Agent response did not include a completion stream');
    }

    const decoder = new TextDecoder();
    const trace: AgentTrace = {};
    const citations: AgentCitation[] = [];
    let completion = '';
    let seenOrchestration = false;

    try {
      for await (const event of response.completion) {
        if (event.chunk) {
          if (event.chunk.bytes) {
            completion += decoder.decode(event.chunk.bytes, { stream: true });
          }
          for (const citation of event.chunk.attribution?.citations ?? []) {
            citations.push({
              generatedResponsePart: citation.generatedResponsePart
                ? toJsonObject(citation.generatedResponsePart)
                : undefined,
              retrievedReferences: (citation.retrievedReferences ?? []).map(toJsonObject),
            });
          }
        }

        const part = event.trace?.trace;
        if (part) {
          seenOrchestration = collectTrace(trace, part, seenOrchestration);
        }
      }
      completion += decoder.decode();
    } catch (error) {
      console.error('[agent] Failed while reading agent response:', error);
      throw new AgentInvocationError(
        `Agent response stream failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    return { completion, trace, citations };
  }
}

/**
 * File one trace part under its type. Returns whether an orchestration
 * trace has been seen so far.
 */
function collectTrace(trace: AgentTrace, part: Trace, seenOrchestration: boolean): boolean {
  if (part.guardrailTrace) {
    appendTrace(trace, seenOrchestration ? 'postGuardrailTrace' : 'preGuardrailTrace', part.guardrailTrace);
  }
  if (part.preProcessingTrace) {
    appendTrace(trace, 'preProcessingTrace', part.preProcessingTrace);
  }
  if (part.orchestrationTrace) {
    appendTrace(trace, 'orchestrationTrace', part.orchestrationTrace);
    seenOrchestration = true;
  }
  if (part.postProcessingTrace) {
    appendTrace(trace, 'postProcessingTrace', part.postProcessingTrace);
  }
  if (part.failureTrace) {
    appendTrace(trace, 'failureTrace', part.failureTrace);
  }
  return seenOrchestration;
}

/**
 * Build an agent backed by the real Bedrock runtime, or null when no agent id is configured.
 */
export function createTeamAgent(config: ServerConfig['bedrock']): TeamAgent | null {
  if (!config.agentId) {
    return null;
  }

  const client = new BedrockAgentRuntimeClient({
    region: config.region,
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined,
  });

  return new TeamAgent(
    { send: (command) => client.send(command) },
    {
      agentId: config.agentId,
      agentAliasId: config.agentAliasId,
      enableTrace: config.enableTrace,
    }
  );
}
