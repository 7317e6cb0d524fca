import { MEASUREMENTS, type DatasetPayload, type Measurement } from "../../types/dataset";
import { formatStat } from "./format";

type SummaryCardsProps = {
  dataset: DatasetPayload;
};

const measurementLabels: Record<Measurement, string> = {
  flowrate: "Flowrate",
  pressure: "Pressure",
  temperature: "Temperature"
};

export const SummaryCards = ({ dataset }: SummaryCardsProps) => {
  const summary = dataset.summary_parsed;
  const statRows = [
    { label: "Average", values: summary.averages },
    { label: "Minimum", values: summary.minimums },
    { label: "Maximum", values: summary.maximums },
    { label: "Std Dev", values: summary.std_deviations }
  ];

  return (
    <section className="summary">
      <div className="summary-cards">
        <article className="card">
          <p className="muted">Total equipment</p>
          <p className="card-value" data-testid="total-count">
            {summary.total_count}
          </p>
        </article>
        <article className="card">
          <p className="muted">Rows uploaded</p>
          <p className="card-value">{dataset.record_count}</p>
        </article>
        <article className={`card ${dataset.dropped_count > 0 ? "card-warning" : ""}`}>
          <p className="muted">Rows dropped</p>
          <p className="card-value" data-testid="dropped-count">
            {dataset.dropped_count}
          </p>
        </article>
        {MEASUREMENTS.map((measurement) => (
          <article key={measurement} className="card">
            <p className="muted">Avg {measurementLabels[measurement].toLowerCase()}</p>
            <p className="card-value">{formatStat(summary.averages[measurement])}</p>
          </article>
        ))}
      </div>

      <table className="stats-table">
        <thead>
          <tr>
            <th>Metric</th>
            {MEASUREMENTS.map((measurement) => (
              <th key={measurement}>{measurementLabels[measurement]}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {statRows.map((row) => (
            <tr key={row.label}>
              <td>{row.label}</td>
              {MEASUREMENTS.map((measurement) => (
                <td key={measurement}>{formatStat(row.values[measurement])}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </section>
  );
};
