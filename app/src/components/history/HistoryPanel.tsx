import type { DatasetListEntry } from "../../types/dataset";
import { formatTimestamp } from "../summary/format";

type HistoryPanelProps = {
  entries: DatasetListEntry[];
  activeId: number | null;
  busy: boolean;
  onSelect: (id: number) => void;
  onDelete: (id: number) => void;
  onDownload: (entry: DatasetListEntry) => void;
};

export const HistoryPanel = ({
  entries,
  activeId,
  busy,
  onSelect,
  onDelete,
  onDownload
}: HistoryPanelProps) => (
  <aside className="history">
    <h3>Recent uploads</h3>
    {entries.length === 0 ? (
      <p className="meta">No uploads yet.</p>
    ) : (
      <ul>
        {entries.map((entry) => (
          <li key={entry.id} className={entry.id === activeId ? "active" : ""}>
            <button
              type="button"
              className="history-select"
              onClick={() => onSelect(entry.id)}
              disabled={busy}
            >
              <span className="history-name">{entry.name}</span>
              <span className="meta">
                {formatTimestamp(entry.uploaded_at)} · {entry.summary_parsed.total_count} valid of{" "}
                {entry.record_count}
              </span>
            </button>
            <div className="history-actions">
              <button
                type="button"
                aria-label={`Download report for ${entry.name}`}
                onClick={() => onDownload(entry)}
                disabled={busy}
              >
                PDF
              </button>
              <button
                type="button"
                className="danger"
                aria-label={`Delete ${entry.name}`}
                onClick={() => onDelete(entry.id)}
                disabled={busy}
              >
                Delete
              </button>
            </div>
          </li>
        ))}
      </ul>
    )}
  </aside>
);
