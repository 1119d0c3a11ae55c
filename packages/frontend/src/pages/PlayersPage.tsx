import { useState, useEffect } from 'react';
import { assignRole, type Player } from '@team-builder/shared';
import { fetchPlayers, importPlayers, deletePlayer } from '../api/players';
import styles from './PlayersPage.module.css';

export default function PlayersPage() {
  const [players, setPlayers] = useState<Player[]>([]);
  const [orgFilter, setOrgFilter] = useState('');
  const [importText, setImportText] = useState('');
  const [importError, setImportError] = useState<string | null>(null);

  useEffect(() => {
    loadPlayers();
  }, []);

  const loadPlayers = async () => {
    try {
      const data = await fetchPlayers();
      setPlayers(data);
    } catch (error) {
      console.error('Failed to fetch players:', error);
    }
  };

  const handleImport = async (e: React.FormEvent) => {
    e.preventDefault();
    setImportError(null);

    let parsed: unknown;
    try {
      parsed = JSON.parse(importText);
    } catch {
      setImportError('Import must be valid JSON');
      return;
    }

    const inputs = Array.isArray(parsed) ? parsed : [parsed];
    try {
      await importPlayers(inputs);
      setImportText('');
      await loadPlayers();
    } catch (error) {
      setImportError(error instanceof Error ? error.message : 'Failed to import players');
    }
  };

  const handleDelete = async (player: Player) => {
    if (!confirm(`Delete ${player.name}?`)) return;
    try {
      await deletePlayer(player.id);
      await loadPlayers();
    } catch (error) {
      console.error('Failed to delete player:', error);
    }
  };

  const orgs = [...new Set(players.map((p) => p.org))].sort();
  const visiblePlayers = orgFilter ? players.filter((p) => p.org === orgFilter) : players;

  return (
    <div className={styles.container}>
      <div className={styles.header}>
        <h2>Players ({visiblePlayers.length})</h2>
        <select value={orgFilter} onChange={(e) => setOrgFilter(e.target.value)}>
          <option value="">All Organizations</option>
          {orgs.map((org) => (
            <option key={org} value={org}>
              {org}
            </option>
          ))}
        </select>
      </div>

      {visiblePlayers.length === 0 ? (
        <p>No players yet. Import some below.</p>
      ) : (
        <table className={styles.table}>
          <thead>
            <tr>
              <th>Name</th>
              <th>Org</th>
              <th>Region</th>
              <th>Agent</th>
              <th>Role</th>
              <th>ACS</th>
              <th>K/D</th>
              <th>ADR</th>
              <th>HS%</th>
              <th />
            </tr>
          </thead>
          <tbody>
            {visiblePlayers.map((player) => (
              <tr key={player.id}>
                <td>{player.name}</td>
                <td>{player.org}</td>
                <td>{player.region ?? '—'}</td>
                <td>{player.agent}</td>
                <td>{assignRole(player.agent)}</td>
                <td>{player.averageCombatScore}</td>
                <td>{player.killDeathRatio}</td>
                <td>{player.averageDamagePerRound}</td>
                <td>{player.headshotPercentage}</td>
                <td>
                  <button className={styles.deleteButton} onClick={() => handleDelete(player)}>
                    Delete
                  </button>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      <form onSubmit={handleImport} className={styles.importForm}>
        <h3>Import Players</h3>
        <textarea
          rows={6}
          value={importText}
          onChange={(e) => setImportText(e.target.value)}
          placeholder='[{"name": "...", "org": "...", "agent": "Jett", "region": "NA", ...}]'
        />
        {importError && <div className={styles.error}>{importError}</div>}
        <div>
          <button type="submit" disabled={!importText.trim()}>
            Import
          </button>
        </div>
      </form>
    </div>
  );
}
