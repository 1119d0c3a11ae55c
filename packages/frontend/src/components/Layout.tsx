import { Outlet, NavLink } from 'react-router-dom';
import { useSession } from '../contexts/SessionContext';
import TraceSidebar from './TraceSidebar';
import styles from './Layout.module.css';

export default function Layout() {
  const { config, reset, session, lastResult } = useSession();

  return (
    <div className={styles.layout}>
      <header className={styles.header}>
        <div className={styles.headerContent}>
          <h1 className={styles.title}>
            <span className={styles.icon}>{config.icon}</span> {config.title}
          </h1>
          <nav className={styles.nav}>
            <NavLink to="/build" className={styles.navLink}>
              Build Team
            </NavLink>
            <NavLink to="/players" className={styles.navLink}>
              Players
            </NavLink>
            <NavLink to="/history" className={styles.navLink}>
              History
            </NavLink>
          </nav>
        </div>
      </header>
      <div className={styles.body}>
        <aside className={styles.sidebar}>
          <button onClick={() => void reset()} disabled={!session}>
            Reset Session
          </button>
          <TraceSidebar trace={lastResult?.trace ?? {}} citations={lastResult?.citations ?? []} />
        </aside>
        <main className={styles.main}>
          <Outlet />
        </main>
      </div>
    </div>
  );
}
