import { useState, useEffect } from 'react';
import ReactMarkdown from 'react-markdown';
import type { TeamBuild } from '@team-builder/shared';
import { useSession } from '../contexts/SessionContext';
import { fetchTeamBuilds, deleteTeamBuild } from '../api/team-builder';
import styles from './BuildHistoryPage.module.css';

export default function BuildHistoryPage() {
  const { session, setLastResult } = useSession();
  const [builds, setBuilds] = useState<TeamBuild[]>([]);
  const [selectedBuild, setSelectedBuild] = useState<TeamBuild | null>(null);
  const [isLoading, setIsLoading] = useState(false);

  useEffect(() => {
    if (session) {
      loadBuilds();
    }
  }, [session]);

  const loadBuilds = async () => {
    if (!session) return;

    setIsLoading(true);
    try {
      const data = await fetchTeamBuilds(session.id);
      setBuilds(data);
      setSelectedBuild(data[0] ?? null);
    } catch (error) {
      console.error('Failed to load team builds:', error);
    } finally {
      setIsLoading(false);
    }
  };

  const selectBuild = (build: TeamBuild) => {
    setSelectedBuild(build);
    // Show this build's trace in the sidebar
    setLastResult(build);
  };

  const handleDelete = async (build: TeamBuild) => {
    try {
      await deleteTeamBuild(build.id);
      await loadBuilds();
    } catch (error) {
      console.error('Failed to delete team build:', error);
    }
  };

  if (!session) {
    return <p>Starting session...</p>;
  }

  return (
    <div className={styles.container}>
      <div className={styles.header}>
        <h2>Build History</h2>
        <button onClick={loadBuilds} disabled={isLoading}>
          {isLoading ? 'Loading...' : 'Refresh'}
        </button>
      </div>

      <div className={styles.content}>
        <div className={styles.list}>
          {builds.length === 0 ? (
            <p className={styles.empty}>No team builds in this session.</p>
          ) : (
            builds.map((build) => (
              <div
                key={build.id}
                className={`${styles.item} ${selectedBuild?.id === build.id ? styles.selected : ''}`}
                onClick={() => selectBuild(build)}
              >
                <span className={build.success ? styles.successBadge : styles.failedBadge}>
                  {build.success ? 'Success' : 'Failed'}
                </span>
                <div>{build.teamType}</div>
                <div className={styles.date}>{new Date(build.createdAt).toLocaleString()}</div>
              </div>
            ))
          )}
        </div>

        <div className={styles.detail}>
          {selectedBuild && (
            <>
              <p>
                {selectedBuild.playerCount} players considered
                {selectedBuild.additionalConstraints && (
                  <> · Constraints: {selectedBuild.additionalConstraints}</>
                )}
              </p>
              {selectedBuild.success ? (
                <ReactMarkdown>{selectedBuild.teamComposition}</ReactMarkdown>
              ) : (
                <ul>
                  {selectedBuild.errors.map((error, index) => (
                    <li key={index}>{error.message}</li>
                  ))}
                </ul>
              )}
              <button onClick={() => handleDelete(selectedBuild)}>Delete</button>
            </>
          )}
        </div>
      </div>
    </div>
  );
}
