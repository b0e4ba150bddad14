import {
  classifyInput,
  makeDisplayOptions,
  renderReport,
  resolveInstant,
  resolveLocalZone,
  resolveZone,
} from "@unixtime/core";

import { Logger } from "../utils/logger";

export type ConvertOptions = {
  milis?: boolean;
  utc?: boolean;
  iso?: boolean;
  timezone?: string;
};

export function convertCommand(
  input: string[],
  options: ConvertOptions,
  logger: Logger,
): void {
  const displayOptions = makeDisplayOptions(options);
  const mode = classifyInput(input);
  logger.verbose(`Input mode: ${mode.kind}`);

  const zone = resolveZone(
    displayOptions.utc,
    resolveLocalZone(options.timezone),
  );
  logger.verbose(`Time zone: ${zone.name}`);

  const instant = resolveInstant(mode, { zone });
  logger.verbose(`Resolved instant: ${instant.toISO()}`);

  for (const line of renderReport(mode, instant, displayOptions)) {
    logger.info(line);
  }
}
