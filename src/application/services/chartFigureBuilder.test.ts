import { describe, expect, it } from "vitest";
import type { MetricSeries } from "../../core/entities/metric";
import {
  buildHistogramFigure,
  buildLineFigure,
  buildPieFigure,
  buildScatterFigure,
  latestValue,
} from "./chartFigureBuilder";

const series = (
  symbol: string,
  metricName: string,
  points: Array<[string, number]>,
  unit = "USD/shares",
): MetricSeries => ({
  symbol,
  metricName,
  unit,
  points: points.map(([end, value]) => ({ end, value, frame: "CY" })),
});

const tsla = series("TSLA", "EarningsPerShareBasic", [
  ["2021-03-31", 0.39],
  ["2021-06-30", 1.18],
]);
const aapl = series("AAPL", "EarningsPerShareBasic", [["2021-06-26", 1.31]]);

describe("latestValue", () => {
  it("takes the last point in provider order", () => {
    expect(latestValue(tsla)).toBe(1.18);
    expect(latestValue(series("X", "M", []))).toBeUndefined();
  });
});

describe("buildLineFigure", () => {
  it("plots one line per symbol with the unit in the axis title", () => {
    const figure = buildLineFigure({
      metricName: "EarningsPerShareBasic",
      symbols: ["TSLA", "AAPL"],
      series: [tsla, aapl],
      excluded: [],
    });

    expect(figure).toEqual({
      chartType: "line",
      data: [
        {
          type: "scatter",
          mode: "lines",
          name: "TSLA",
          x: ["2021-03-31", "2021-06-30"],
          y: [0.39, 1.18],
        },
        {
          type: "scatter",
          mode: "lines",
          name: "AAPL",
          x: ["2021-06-26"],
          y: [1.31],
        },
      ],
      layout: {
        title: { text: "EarningsPerShareBasic Over Time", x: 0.5 },
        xaxis: { title: { text: "Time" } },
        yaxis: { title: { text: "EarningsPerShareBasic (USD/shares)" } },
        legend: { title: { text: "Tickers" } },
      },
    });
  });

  it("stacks traces for area charts", () => {
    const figure = buildLineFigure(
      {
        metricName: "EarningsPerShareBasic",
        symbols: ["AAPL"],
        series: [aapl],
        excluded: [],
      },
      { stacked: true },
    );

    expect(figure.chartType).toBe("area");
    expect(figure.data).toEqual([
      {
        type: "scatter",
        mode: "lines",
        name: "AAPL",
        x: ["2021-06-26"],
        y: [1.31],
        hoverinfo: "x+y",
        line: { width: 0.5 },
        stackgroup: "one",
      },
    ]);
  });

  it("omits the unit when every symbol failed", () => {
    const figure = buildLineFigure({
      metricName: "EarningsPerShareBasic",
      symbols: ["TSLA"],
      series: [],
      excluded: [],
    });

    expect(figure.data).toEqual([]);
    expect(figure.layout.yaxis).toEqual({
      title: { text: "EarningsPerShareBasic" },
    });
  });
});

describe("buildPieFigure", () => {
  it("labels each slice with the symbol that produced its value", () => {
    const figure = buildPieFigure({
      metricName: "EarningsPerShareBasic",
      symbols: ["TSLA", "BROKEN", "AAPL"],
      series: [tsla, aapl],
      excluded: [],
    });

    expect(figure).toEqual({
      chartType: "pie",
      data: [{ type: "pie", labels: ["TSLA", "AAPL"], values: [1.18, 1.31] }],
      layout: {
        title: { text: "EarningsPerShareBasic Comparison", x: 0.5 },
        legend: { title: { text: "Tickers" } },
      },
    });
  });
});

describe("buildScatterFigure", () => {
  it("places each symbol at its latest pair of values", () => {
    const figure = buildScatterFigure({
      metricX: "Revenues",
      metricY: "NetIncomeLoss",
      symbols: ["AAPL", "MSFT"],
      pairs: [
        {
          symbol: "AAPL",
          x: series("AAPL", "Revenues", [["2021-06-26", 81.4]], "USD"),
          y: series("AAPL", "NetIncomeLoss", [["2021-06-26", 21.7]], "USD"),
        },
        {
          symbol: "MSFT",
          x: series("MSFT", "Revenues", [["2021-06-30", 46.2]], "USD"),
          y: series("MSFT", "NetIncomeLoss", [["2021-06-30", 16.5]], "USD"),
        },
      ],
      excluded: [],
    });

    expect(figure).toEqual({
      chartType: "scatter",
      data: [
        {
          type: "scatter",
          mode: "markers+text",
          x: [81.4, 46.2],
          y: [21.7, 16.5],
          text: ["AAPL", "MSFT"],
          textposition: "top center",
        },
      ],
      layout: {
        title: { text: "NetIncomeLoss vs Revenues", x: 0.5 },
        xaxis: { title: { text: "Revenues (USD)" } },
        yaxis: { title: { text: "NetIncomeLoss (USD)" } },
      },
    });
  });
});

describe("buildHistogramFigure", () => {
  it("overlays one histogram per industry of latest values", () => {
    const figure = buildHistogramFigure({
      metricName: "EarningsPerShareBasic",
      industries: [
        { industry: "Automobiles", series: [tsla] },
        {
          industry: "Banking",
          series: [
            series("JPM", "EarningsPerShareBasic", [["2021-06-30", 3.8]]),
            series("BAC", "EarningsPerShareBasic", [["2021-06-30", 1.03]]),
          ],
        },
      ],
      excluded: [],
    });

    expect(figure).toEqual({
      chartType: "histogram",
      data: [
        { type: "histogram", name: "Automobiles", x: [1.18], opacity: 0.75 },
        { type: "histogram", name: "Banking", x: [3.8, 1.03], opacity: 0.75 },
      ],
      layout: {
        title: { text: "EarningsPerShareBasic Distribution by Industry", x: 0.5 },
        xaxis: { title: { text: "EarningsPerShareBasic (USD/shares)" } },
        yaxis: { title: { text: "Companies" } },
        legend: { title: { text: "Industries" } },
        barmode: "overlay",
      },
    });
  });
});
