import pino, { type LevelWithSilent } from "pino";

const levelFor = (nodeEnv: string | undefined): LevelWithSilent => {
  if (nodeEnv === "production") {
    return "info";
  }

  return nodeEnv === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "filings-compare",
  level: levelFor(process.env.NODE_ENV),
});
