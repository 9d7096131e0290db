import type { ChartFigure } from "../entities/chart";

export type RenderedChart = {
  location: string;
};

export interface ChartRendererPort {
  render(figure: ChartFigure, name: string): Promise<RenderedChart>;
}
