import { Routes, Route, Navigate } from 'react-router-dom';
import Layout from './components/Layout';
import TeamBuilderPage from './pages/TeamBuilderPage';
import PlayersPage from './pages/PlayersPage';
import BuildHistoryPage from './pages/BuildHistoryPage';
import { SessionProvider } from './contexts/SessionContext';

function App() {
  return (
    <SessionProvider>
      <Routes>
        <Route path="/" element={<Layout />}>
          <Route index element={<Navigate to="/build" replace />} />
          <Route path="build" element={<TeamBuilderPage />} />
          <Route path="players" element={<PlayersPage />} />
          <Route path="history" element={<BuildHistoryPage />} />
        </Route>
      </Routes>
    </SessionProvider>
  );
}

export default App;
