import { useMemo } from 'react';
import {
  flattenCitations,
  groupTraceSteps,
  hasTraceSteps,
  type AgentCitation,
  type AgentTrace,
} from '@team-builder/shared';
import styles from './TraceSidebar.module.css';

interface TraceSidebarProps {
  trace: AgentTrace;
  citations: AgentCitation[];
}

// Trace steps and citations of the latest build, shown as collapsible JSON like the Bedrock console
export default function TraceSidebar({ trace, citations }: TraceSidebarProps) {
  const sections = useMemo(() => groupTraceSteps(trace), [trace]);
  const citationItems = useMemo(() => flattenCitations(citations), [citations]);

  return (
    <div className={styles.container}>
      <h2 className={styles.title}>Trace &amp; Citations</h2>
      <hr />
      <h3>Trace</h3>
      {sections.map((section) => (
        <div key={section.header} className={styles.section}>
          <h4>{section.header}</h4>
          {section.steps.map((step) => (
            <details key={step.stepNumber} className={styles.step}>
              <summary>Trace Step {step.stepNumber}</summary>
              {step.entries.map((entry, index) => (
                <pre key={index} className={styles.code}>
                  {JSON.stringify(entry, null, 2)}
                </pre>
              ))}
            </details>
          ))}
        </div>
      ))}
      {!hasTraceSteps(sections) && <p className={styles.empty}>No trace information available.</p>}

      <hr />
      <h3>Citations</h3>
      {citationItems.length === 0 ? (
        <p className={styles.empty}>No citations available.</p>
      ) : (
        citationItems.map((item) => (
          <details key={item.citationNumber} className={styles.step}>
            <summary>Citation [{item.citationNumber}]</summary>
            <pre className={styles.code}>
              {JSON.stringify(
                {
                  generatedResponsePart: item.generatedResponsePart,
                  retrievedReference: item.retrievedReference,
                },
                null,
                2
              )}
            </pre>
          </details>
        ))
      )}
    </div>
  );
}
