/**
 * Trace and citation payloads returned by the hosted agent.
 * Entries are kept as plain JSON so they can be stored and shown verbatim.
 */
export type JsonObject = { [key: string]: unknown };

export type TraceType =
  | 'preGuardrailTrace'
  | 'preProcessingTrace'
  | 'orchestrationTrace'
  | 'postProcessingTrace'
  | 'postGuardrailTrace'
  | 'failureTrace';

export type AgentTrace = Partial<Record<TraceType, JsonObject[]>>;

export interface AgentCitation {
  generatedResponsePart?: JsonObject;
  retrievedReferences?: JsonObject[];
}

/**
 * One numbered step in the trace sidebar.
 * A step holds every entry that shares a traceId within one trace type.
 */
export interface TraceStep {
  stepNumber: number;
  traceType: TraceType;
  traceId: string;
  entries: JsonObject[];
}

export interface TraceSection {
  header: 'Pre-Processing' | 'Orchestration' | 'Post-Processing';
  steps: TraceStep[];
}

export interface CitationItem {
  citationNumber: number;
  generatedResponsePart: JsonObject;
  retrievedReference: JsonObject;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
