/**
 * One reported value as it appears under a unit in the SEC company facts document.
 */
export type ReportRecord = {
  end: string;
  val: number;
  form: string;
  frame?: string | null;
  fy?: number | null;
  fp?: string | null;
  filed?: string;
  accn?: string;
};

export type MetricPoint = {
  end: string;
  value: number;
  frame: string;
};

/**
 * Quarterly, frame-tagged values for one symbol and metric, in provider order, under a single unit.
 */
export type MetricSeries = {
  symbol: string;
  metricName: string;
  unit: string;
  points: MetricPoint[];
};

export type PeerGrouping = "sector" | "industry" | "subIndustry";
