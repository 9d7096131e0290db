export type ChartType = "line" | "area" | "pie" | "scatter" | "histogram";

export type LineTrace = {
  type: "scatter";
  mode: "lines";
  name: string;
  x: string[];
  y: number[];
  stackgroup?: string;
  line?: { width: number };
  hoverinfo?: string;
};

export type MarkerTrace = {
  type: "scatter";
  mode: "markers+text";
  x: number[];
  y: number[];
  text: string[];
  textposition: "top center";
};

export type PieTrace = {
  type: "pie";
  labels: string[];
  values: number[];
};

export type HistogramTrace = {
  type: "histogram";
  name: string;
  x: number[];
  opacity: number;
};

export type ChartTrace = LineTrace | MarkerTrace | PieTrace | HistogramTrace;

type AxisTitle = { title: { text: string } };

export type ChartLayout = {
  title: { text: string; x: number };
  xaxis?: AxisTitle;
  yaxis?: AxisTitle;
  legend?: AxisTitle;
  barmode?: "overlay";
};

/**
 * Plotly-compatible figure document; `data` and `layout` are passed to the renderer untouched.
 */
export type ChartFigure = {
  chartType: ChartType;
  data: ChartTrace[];
  layout: ChartLayout;
};
