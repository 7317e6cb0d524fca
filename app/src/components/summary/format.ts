export const formatStat = (value: number | null): string =>
  value === null ? "—" : value.toLocaleString("en-US", { maximumFractionDigits: 2 });

export const formatTimestamp = (value: string): string => {
  const date = new Date(value);
  if (Number.isNaN(date.valueOf())) {
    return value;
  }
  return `${date.toLocaleDateString("en-GB")} ${date.toLocaleTimeString("en-GB", {
    hour: "2-digit",
    minute: "2-digit"
  })}`;
};
