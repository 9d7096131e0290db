import type {
  ChartFigure,
  HistogramTrace,
  LineTrace,
} from "../../core/entities/chart";
import type { MetricSeries } from "../../core/entities/metric";
import type {
  IndustryCollection,
  PairCollection,
  SeriesCollection,
} from "./chartDataService";

const HISTOGRAM_OPACITY = 0.75;

/**
 * Most recent reported value, i.e. the last point in provider order.
 */
export const latestValue = (series: MetricSeries): number | undefined =>
  series.points.at(-1)?.value;

/**
 * Takes the unit from the first collected series so axis titles never depend on loop state.
 */
const unitOf = (series: MetricSeries[]): string | undefined => series[0]?.unit;

const withUnit = (label: string, unit: string | undefined): string =>
  unit ? `${label} (${unit})` : label;

const centeredTitle = (text: string) => ({ text, x: 0.5 });

const axisTitle = (text: string) => ({ title: { text } });

export const buildLineFigure = (
  collection: SeriesCollection,
  options: { stacked: boolean } = { stacked: false },
): ChartFigure => {
  const data = collection.series.map((series): LineTrace => {
    const trace: LineTrace = {
      type: "scatter",
      mode: "lines",
      name: series.symbol,
      x: series.points.map((point) => point.end),
      y: series.points.map((point) => point.value),
    };

    if (!options.stacked) {
      return trace;
    }

    return {
      ...trace,
      hoverinfo: "x+y",
      line: { width: 0.5 },
      stackgroup: "one",
    };
  });

  return {
    chartType: options.stacked ? "area" : "line",
    data,
    layout: {
      title: centeredTitle(`${collection.metricName} Over Time`),
      xaxis: axisTitle("Time"),
      yaxis: axisTitle(
        withUnit(collection.metricName, unitOf(collection.series)),
      ),
      legend: axisTitle("Tickers"),
    },
  };
};

export const buildPieFigure = (collection: SeriesCollection): ChartFigure => {
  const labels: string[] = [];
  const values: number[] = [];

  for (const series of collection.series) {
    const value = latestValue(series);
    if (value === undefined) {
      continue;
    }
    labels.push(series.symbol);
    values.push(value);
  }

  return {
    chartType: "pie",
    data: [{ type: "pie", labels, values }],
    layout: {
      title: centeredTitle(`${collection.metricName} Comparison`),
      legend: axisTitle("Tickers"),
    },
  };
};

export const buildScatterFigure = (collection: PairCollection): ChartFigure => {
  const x: number[] = [];
  const y: number[] = [];
  const text: string[] = [];

  for (const pair of collection.pairs) {
    const xValue = latestValue(pair.x);
    const yValue = latestValue(pair.y);
    if (xValue === undefined || yValue === undefined) {
      continue;
    }
    x.push(xValue);
    y.push(yValue);
    text.push(pair.symbol);
  }

  const firstPair = collection.pairs[0];

  return {
    chartType: "scatter",
    data: [
      {
        type: "scatter",
        mode: "markers+text",
        x,
        y,
        text,
        textposition: "top center",
      },
    ],
    layout: {
      title: centeredTitle(`${collection.metricY} vs ${collection.metricX}`),
      xaxis: axisTitle(withUnit(collection.metricX, firstPair?.x.unit)),
      yaxis: axisTitle(withUnit(collection.metricY, firstPair?.y.unit)),
    },
  };
};

export const buildHistogramFigure = (
  collection: IndustryCollection,
): ChartFigure => {
  const data = collection.industries.map(
    (group): HistogramTrace => ({
      type: "histogram",
      name: group.industry,
      x: group.series
        .map(latestValue)
        .filter((value): value is number => value !== undefined),
      opacity: HISTOGRAM_OPACITY,
    }),
  );

  const unit = unitOf(collection.industries.flatMap((group) => group.series));

  return {
    chartType: "histogram",
    data,
    layout: {
      title: centeredTitle(`${collection.metricName} Distribution by Industry`),
      xaxis: axisTitle(withUnit(collection.metricName, unit)),
      yaxis: axisTitle("Companies"),
      legend: axisTitle("Industries"),
      barmode: "overlay",
    },
  };
};
