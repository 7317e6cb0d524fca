import { useMemo, useState } from "react";
import { COLUMN_LABELS, type CellValue, type RawEquipmentRow, type RowIssue } from "../../types/dataset";

type EquipmentTableProps = {
  rows: RawEquipmentRow[];
  issues: RowIssue[];
};

const formatCell = (cell: CellValue): string => {
  if (cell === null) {
    return "";
  }
  return typeof cell === "number" ? cell.toString() : cell;
};

const columns = Object.values(COLUMN_LABELS);

export const EquipmentTable = ({ rows, issues }: EquipmentTableProps) => {
  const [query, setQuery] = useState("");

  // Issue rows are 1-based positions in the uploaded file.
  const issuesByRow = useMemo(() => {
    const grouped = new Map<number, string[]>();
    issues.forEach((issue) => {
      grouped.set(issue.row, [...(grouped.get(issue.row) ?? []), issue.message]);
    });
    return grouped;
  }, [issues]);

  const visibleRows = useMemo(() => {
    const needle = query.trim().toLowerCase();
    return rows
      .map((row, index) => ({ row, rowNumber: index + 1 }))
      .filter(({ row }) => {
        if (!needle) {
          return true;
        }
        return [row["Equipment Name"], row.Type].some((cell) =>
          formatCell(cell).toLowerCase().includes(needle)
        );
      });
  }, [rows, query]);

  return (
    <section className="equipment-table">
      <header className="section-header">
        <h3>Equipment data</h3>
        <input
          type="search"
          placeholder="Filter by name or type"
          value={query}
          onChange={(event) => setQuery(event.target.value)}
        />
      </header>
      <table>
        <thead>
          <tr>
            <th className="row-index">#</th>
            {columns.map((column) => (
              <th key={column}>{column}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {visibleRows.map(({ row, rowNumber }) => {
            const rowIssues = issuesByRow.get(rowNumber);
            return (
              <tr
                key={`row-${rowNumber}`}
                className={rowIssues ? "row-invalid" : ""}
                title={rowIssues?.join(" ")}
              >
                <td className="row-index">{rowNumber}</td>
                <td>{formatCell(row["Equipment Name"])}</td>
                <td>{formatCell(row.Type)}</td>
                <td>{formatCell(row.Flowrate)}</td>
                <td>{formatCell(row.Pressure)}</td>
                <td>{formatCell(row.Temperature)}</td>
              </tr>
            );
          })}
        </tbody>
      </table>
      {visibleRows.length === 0 && <p className="meta">No rows match the filter.</p>}
    </section>
  );
};
