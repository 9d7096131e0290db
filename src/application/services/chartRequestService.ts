import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { ChartFigure } from "../../core/entities/chart";
import type {
  ChartRendererPort,
  RenderedChart,
} from "../../core/ports/outboundPorts";
import type { ChartDataService, ExcludedEntry } from "./chartDataService";
import {
  buildHistogramFigure,
  buildLineFigure,
  buildPieFigure,
  buildScatterFigure,
} from "./chartFigureBuilder";

export type ChartRequest =
  | {
      chartType: "line" | "area" | "pie";
      metricName: string;
      symbols: string[];
    }
  | {
      chartType: "scatter";
      metricX: string;
      metricY: string;
      symbols: string[];
    }
  | {
      chartType: "histogram";
      metricName: string;
      industries: string[];
    };

export type ChartOutcome = {
  figure: ChartFigure;
  rendered: RenderedChart;
  excluded: ExcludedEntry[];
};

type AssembledChart = {
  figure: ChartFigure;
  name: string;
  excluded: ExcludedEntry[];
};

/**
 * Runs one chart request end to end: collect data, build the figure, hand it to the renderer.
 */
export class ChartRequestService {
  constructor(
    private readonly chartData: ChartDataService,
    private readonly renderer: ChartRendererPort,
  ) {}

  /**
   * Fails only when there is nothing to chart, i.e. the peer lookup behind a single-symbol request failed.
   */
  async run(
    request: ChartRequest,
  ): Promise<Result<ChartOutcome, AppBoundaryError>> {
    const assembled = await this.assemble(request);
    if (assembled.isErr()) {
      return err(assembled.error);
    }

    const { figure, name, excluded } = assembled.value;
    const rendered = await this.renderer.render(figure, name);

    return ok({ figure, rendered, excluded });
  }

  async assemble(
    request: ChartRequest,
  ): Promise<Result<AssembledChart, AppBoundaryError>> {
    switch (request.chartType) {
      case "line":
      case "area":
      case "pie": {
        const { chartType, metricName } = request;
        const collection = await this.chartData.collectSeries(
          metricName,
          request.symbols,
        );

        return collection.map((value) => ({
          figure:
            chartType === "pie"
              ? buildPieFigure(value)
              : buildLineFigure(value, { stacked: chartType === "area" }),
          name: `${metricName}-${chartType}`,
          excluded: value.excluded,
        }));
      }
      case "scatter": {
        const { metricX, metricY } = request;
        const collection = await this.chartData.collectPairs(
          metricX,
          metricY,
          request.symbols,
        );

        return collection.map((value) => ({
          figure: buildScatterFigure(value),
          name: `${metricY}-vs-${metricX}-scatter`,
          excluded: value.excluded,
        }));
      }
      case "histogram": {
        const collection = await this.chartData.collectIndustries(
          request.metricName,
          request.industries,
        );

        return ok({
          figure: buildHistogramFigure(collection),
          name: `${request.metricName}-histogram`,
          excluded: collection.excluded,
        });
      }
    }
  }
}
