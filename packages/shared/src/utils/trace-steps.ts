import type {
  AgentCitation,
  AgentTrace,
  CitationItem,
  JsonObject,
  TraceSection,
  TraceStep,
  TraceType,
} from '../types/agent-trace.js';
import { isJsonObject } from '../types/agent-trace.js';

const TRACE_SECTIONS: Array<{ header: TraceSection['header']; traceTypes: TraceType[] }> = [
  { header: 'Pre-Processing', traceTypes: ['preGuardrailTrace', 'preProcessingTrace'] },
  { header: 'Orchestration', traceTypes: ['orchestrationTrace'] },
  { header: 'Post-Processing', traceTypes: ['postProcessingTrace', 'postGuardrailTrace'] },
];

// Fields that carry the traceId, checked in order, for each trace type that nests it
const TRACE_INFO_FIELDS: Partial<Record<TraceType, string[]>> = {
  preProcessingTrace: ['modelInvocationInput', 'modelInvocationOutput'],
  orchestrationTrace: [
    'invocationInput',
    'modelInvocationInput',
    'modelInvocationOutput',
    'observation',
    'rationale',
  ],
  postProcessingTrace: ['modelInvocationInput', 'modelInvocationOutput', 'observation'],
};

function readTraceId(value: unknown): string | undefined {
  if (!isJsonObject(value)) return undefined;
  const traceId = value.traceId;
  return typeof traceId === 'string' ? traceId : undefined;
}

/**
 * Group a collected agent trace into numbered steps, one per traceId, under
 * the three sidebar sections. Entries whose traceId cannot be found are skipped.
 * Step numbers run from 1 across all sections.
 */
export function groupTraceSteps(trace: AgentTrace): TraceSection[] {
  let stepNumber = 1;

  return TRACE_SECTIONS.map(({ header, traceTypes }) => {
    const steps: TraceStep[] = [];

    for (const traceType of traceTypes) {
      const entries = trace[traceType];
      if (!entries) continue;

      const byTraceId = new Map<string, JsonObject[]>();
      const infoFields = TRACE_INFO_FIELDS[traceType];

      for (const entry of entries) {
        if (infoFields) {
          const field = infoFields.find((name) => name in entry);
          const traceId = field ? readTraceId(entry[field]) : undefined;
          if (traceId === undefined) continue;

          const existing = byTraceId.get(traceId);
          if (existing) {
            existing.push(entry);
          } else {
            byTraceId.set(traceId, [entry]);
          }
        } else {
          const traceId = readTraceId(entry);
          if (traceId === undefined) continue;
          byTraceId.set(traceId, [{ [traceType]: entry }]);
        }
      }

      for (const [traceId, stepEntries] of byTraceId) {
        steps.push({ stepNumber: stepNumber++, traceType, traceId, entries: stepEntries });
      }
    }

    return { header, steps };
  });
}

export function hasTraceSteps(sections: TraceSection[]): boolean {
  return sections.some((section) => section.steps.length > 0);
}

/**
 * One numbered item per retrieved reference, paired with the response part it supports
 */
export function flattenCitations(citations: AgentCitation[]): CitationItem[] {
  const items: CitationItem[] = [];
  for (const citation of citations) {
    for (const retrievedReference of citation.retrievedReferences ?? []) {
      items.push({
        citationNumber: items.length + 1,
        generatedResponsePart: citation.generatedResponsePart ?? {},
        retrievedReference,
      });
    }
  }
  return items;
}
