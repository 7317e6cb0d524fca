import {
  ArcElement,
  BarElement,
  CategoryScale,
  Chart as ChartJS,
  Legend,
  LinearScale,
  Tooltip
} from "chart.js";
import { Bar, Pie } from "react-chartjs-2";
import { MEASUREMENTS, type SummaryPayload } from "../../types/dataset";

ChartJS.register(ArcElement, BarElement, CategoryScale, LinearScale, Legend, Tooltip);

type SummaryChartsProps = {
  summary: SummaryPayload;
};

const palette = ["#2563eb", "#16a34a", "#f59e0b", "#dc2626", "#7c3aed", "#0891b2", "#db2777"];

const measurementLabels = ["Flowrate", "Pressure", "Temperature"];

export const SummaryCharts = ({ summary }: SummaryChartsProps) => {
  const types = Object.keys(summary.type_distribution);

  if (summary.total_count === 0) {
    return (
      <section className="charts">
        <p className="meta">No valid rows to chart.</p>
      </section>
    );
  }

  const averagesData = {
    labels: measurementLabels,
    datasets: [
      {
        label: "Average",
        data: MEASUREMENTS.map((measurement) => summary.averages[measurement] ?? 0),
        backgroundColor: "#2563eb"
      },
      {
        label: "Std deviation",
        data: MEASUREMENTS.map((measurement) => summary.std_deviations[measurement] ?? 0),
        backgroundColor: "#94a3b8"
      }
    ]
  };

  const distributionData = {
    labels: types,
    datasets: [
      {
        label: "Equipment count",
        data: types.map((type) => summary.type_distribution[type] ?? 0),
        backgroundColor: types.map((_, index) => palette[index % palette.length])
      }
    ]
  };

  const legendBottom = { responsive: true, plugins: { legend: { position: "bottom" as const } } };

  return (
    <section className="charts">
      <article className="chart-card">
        <h3>Averages by parameter</h3>
        <Bar data={averagesData} options={legendBottom} />
      </article>
      <article className="chart-card">
        <h3>Equipment count by type</h3>
        <Bar data={distributionData} options={{ responsive: true, plugins: { legend: { display: false } } }} />
      </article>
      <article className="chart-card">
        <h3>Equipment type distribution</h3>
        <Pie data={distributionData} options={legendBottom} />
      </article>
    </section>
  );
};
