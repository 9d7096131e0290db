import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { ChartFigure } from "../../core/entities/chart";
import type {
  ChartRendererPort,
  RenderedChart,
} from "../../core/ports/outboundPorts";

export const PLOTLY_CDN_URL = "https://cdn.plot.ly/plotly-2.35.2.min.js";

const toFileName = (name: string): string =>
  `${name.replace(/[^A-Za-z0-9._-]+/g, "_")}.html`;

// Inline JSON must not be able to close the surrounding <script> element.
const toInlineJson = (value: unknown): string =>
  JSON.stringify(value).replace(/</g, "\\u003c");

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

export const toChartHtml = (figure: ChartFigure): string =>
  [
    "<!doctype html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(figure.layout.title.text)}</title>`,
    `<script src="${PLOTLY_CDN_URL}"></script>`,
    "</head>",
    "<body>",
    '<div id="chart" style="width:100%;height:90vh;"></div>',
    "<script>",
    `Plotly.newPlot("chart", ${toInlineJson(figure.data)}, ${toInlineJson(figure.layout)});`,
    "</script>",
    "</body>",
    "</html>",
    "",
  ].join("\n");

/**
 * Writes each figure to a standalone plotly.js page in the output directory.
 */
export class HtmlChartRenderer implements ChartRendererPort {
  constructor(private readonly outputDir: string) {}

  async render(figure: ChartFigure, name: string): Promise<RenderedChart> {
    const directory = resolve(this.outputDir);
    await mkdir(directory, { recursive: true });

    const location = join(directory, toFileName(name));
    await writeFile(location, toChartHtml(figure), "utf8");

    return { location };
  }
}
