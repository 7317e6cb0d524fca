import { useCallback, useEffect, useState } from "react";
import "./App.css";
import { LoginPanel, type Credentials } from "./components/auth/LoginPanel";
import { SummaryCharts } from "./components/charts/SummaryCharts";
import { HistoryPanel } from "./components/history/HistoryPanel";
import { SummaryCards } from "./components/summary/SummaryCards";
import { EquipmentTable } from "./components/table/EquipmentTable";
import { UploadPanel } from "./components/upload/UploadPanel";
import {
  ApiRequestError,
  deleteDataset,
  downloadReport,
  fetchDataset,
  fetchHistory,
  fetchLatestDataset,
  fetchProfile,
  getStoredToken,
  login,
  logout,
  register,
  setStoredToken,
  uploadCsv
} from "./lib/api/client";
import { saveBlob } from "./lib/api/download";
import type { UploadSource } from "./lib/import/parseFile";
import type { DatasetListEntry, DatasetPayload, UserProfile } from "./types/dataset";

const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : fallback;

function App() {
  const [token, setToken] = useState<string | null>(() => getStoredToken());
  const [user, setUser] = useState<UserProfile | null>(null);
  const [dataset, setDataset] = useState<DatasetPayload | null>(null);
  const [history, setHistory] = useState<DatasetListEntry[]>([]);
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const refreshHistory = useCallback(async () => {
    setHistory(await fetchHistory());
  }, []);

  useEffect(() => {
    if (!token) {
      return;
    }
    let cancelled = false;
    const load = async () => {
      try {
        const [profile, latest, recent] = await Promise.all([
          fetchProfile(),
          fetchLatestDataset(),
          fetchHistory()
        ]);
        if (cancelled) {
          return;
        }
        setUser(profile);
        setDataset(latest);
        setHistory(recent);
      } catch (loadError) {
        if (cancelled) {
          return;
        }
        // A rejected token means the session is gone; show the sign-in form.
        if (loadError instanceof ApiRequestError && loadError.status === 401) {
          setStoredToken(null);
          setToken(null);
          setUser(null);
          return;
        }
        setError(errorMessage(loadError, "Could not load the dashboard."));
      }
    };
    void load();
    return () => {
      cancelled = true;
    };
  }, [token]);

  const startSession = (nextToken: string, profile: UserProfile) => {
    setStoredToken(nextToken);
    setUser(profile);
    setError(null);
    setToken(nextToken);
  };

  const handleLogin = async ({ username, password }: Credentials) => {
    const response = await login(username, password);
    startSession(response.token, response.user);
  };

  const handleRegister = async ({ username, password, email }: Credentials) => {
    const response = await register(username, password, email ?? "");
    startSession(response.token, response.user);
  };

  const handleLogout = async () => {
    try {
      await logout();
    } catch (logoutError) {
      console.warn("[auth] logout failed", { message: errorMessage(logoutError, "unknown") });
    }
    setStoredToken(null);
    setToken(null);
    setUser(null);
    setDataset(null);
    setHistory([]);
  };

  const runAction = async (action: () => Promise<void>, fallback: string) => {
    setBusy(true);
    setError(null);
    try {
      await action();
    } catch (actionError) {
      setError(errorMessage(actionError, fallback));
    } finally {
      setBusy(false);
    }
  };

  const handleUpload = async (source: UploadSource, name: string) => {
    setBusy(true);
    setError(null);
    try {
      const response = await uploadCsv(source.fileName, source.content, name || undefined);
      setDataset(response.dataset);
      await refreshHistory();
    } finally {
      setBusy(false);
    }
  };

  const handleSelect = (id: number) =>
    void runAction(async () => {
      setDataset(await fetchDataset(id));
    }, "Could not load the dataset.");

  const handleDelete = (id: number) =>
    void runAction(async () => {
      await deleteDataset(id);
      if (dataset?.id === id) {
        setDataset(await fetchLatestDataset());
      }
      await refreshHistory();
    }, "Could not delete the dataset.");

  const handleDownload = (entry: DatasetListEntry) =>
    void runAction(async () => {
      saveBlob(await downloadReport(entry.id), `report_${entry.name}.pdf`);
    }, "Could not download the report.");

  if (!token) {
    return (
      <div className="app app-auth">
        <header className="app-header">
          <h1>Chemical Equipment Parameter Visualizer</h1>
        </header>
        <LoginPanel onLogin={handleLogin} onRegister={handleRegister} />
      </div>
    );
  }

  return (
    <div className="app">
      <header className="app-header">
        <h1>Chemical Equipment Parameter Visualizer</h1>
        <div className="session">
          {user && <span className="meta">Signed in as {user.username}</span>}
          <button type="button" onClick={() => void handleLogout()}>
            Sign out
          </button>
        </div>
      </header>

      {error && (
        <p className="error banner" role="alert">
          {error}
        </p>
      )}

      <div className="layout">
        <div className="sidebar">
          <UploadPanel busy={busy} onUpload={handleUpload} />
          <HistoryPanel
            entries={history}
            activeId={dataset?.id ?? null}
            busy={busy}
            onSelect={handleSelect}
            onDelete={handleDelete}
            onDownload={handleDownload}
          />
        </div>
        <main className="content">
          {dataset ? (
            <>
              <header className="section-header">
                <h2>{dataset.name}</h2>
                <span className="meta">Uploaded by {dataset.uploaded_by_name}</span>
              </header>
              <SummaryCards dataset={dataset} />
              <SummaryCharts summary={dataset.summary_parsed} />
              <EquipmentTable rows={dataset.raw_data_parsed} issues={dataset.row_issues} />
            </>
          ) : (
            <p className="meta empty-state">Upload a CSV file to see its summary.</p>
          )}
        </main>
      </div>
    </div>
  );
}

export default App;
