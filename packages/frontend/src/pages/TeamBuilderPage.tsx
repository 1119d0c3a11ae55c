import { useState, useEffect } from 'react';
import ReactMarkdown from 'react-markdown';
import type { TeamTypeInfo } from '@team-builder/shared';
import { useSession } from '../contexts/SessionContext';
import { buildTeam, fetchTeamTypes } from '../api/team-builder';
import styles from './TeamBuilderPage.module.css';

export default function TeamBuilderPage() {
  const { session, lastResult, setLastResult } = useSession();
  const [teamTypes, setTeamTypes] = useState<TeamTypeInfo[]>([]);
  const [teamType, setTeamType] = useState('');
  const [additionalConstraints, setAdditionalConstraints] = useState('');
  const [isBuilding, setIsBuilding] = useState(false);
  const [requestError, setRequestError] = useState<string | null>(null);

  useEffect(() => {
    loadTeamTypes();
  }, []);

  const loadTeamTypes = async () => {
    try {
      const data = await fetchTeamTypes();
      setTeamTypes(data);
      if (data.length > 0) {
        setTeamType(data[0].teamType);
      }
    } catch (error) {
      console.error('Failed to load team types:', error);
    }
  };

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    if (!session || !teamType) return;

    setIsBuilding(true);
    setRequestError(null);
    try {
      const result = await buildTeam({
        sessionId: session.id,
        teamType,
        additionalConstraints: additionalConstraints.trim() || undefined,
      });
      setLastResult(result);
    } catch (error) {
      console.error('Failed to build team:', error);
      setRequestError(error instanceof Error ? error.message : 'Failed to build team');
    } finally {
      setIsBuilding(false);
    }
  };

  const selectedType = teamTypes.find((t) => t.teamType === teamType);

  return (
    <div className={styles.container}>
      <p className={styles.intro}>
        Generate and analyze VALORANT team compositions based on player data.
      </p>

      <h2>Build Your Team</h2>
      <form onSubmit={handleSubmit} className={styles.form}>
        <label htmlFor="team-type">Select Team Submission Type:</label>
        <select
          id="team-type"
          value={teamType}
          onChange={(e) => setTeamType(e.target.value)}
          title="Choose the type of team you want to build."
        >
          {teamTypes.map((t) => (
            <option key={t.teamType} value={t.teamType}>
              {t.teamType}
            </option>
          ))}
        </select>
        {selectedType && <p className={styles.help}>{selectedType.description}</p>}

        <label htmlFor="constraints">Additional Constraints (Optional):</label>
        <textarea
          id="constraints"
          rows={4}
          value={additionalConstraints}
          onChange={(e) => setAdditionalConstraints(e.target.value)}
          placeholder="Enter any additional constraints or leave blank."
        />

        <div>
          <button type="submit" disabled={isBuilding || !session || !teamType}>
            Build Team
          </button>
        </div>
      </form>

      {isBuilding && <p className={styles.spinner}>Generating team composition...</p>}

      {requestError && <div className={styles.error}>{requestError}</div>}

      {!isBuilding && lastResult && (
        <div className={styles.result}>
          {lastResult.success ? (
            <>
              <div className={styles.success}>Team composition generated successfully!</div>
              <h3>Team Composition</h3>
              <div className={styles.markdown}>
                <ReactMarkdown>{lastResult.teamComposition}</ReactMarkdown>
              </div>
            </>
          ) : (
            lastResult.errors.map((error, index) => (
              <div key={index} className={styles.error}>
                {error.message}
              </div>
            ))
          )}
        </div>
      )}
    </div>
  );
}
