import type { MerakiTransport } from "../client.js";
import { stderrLogger, type Logger } from "../log.js";
import { sleep, type Sleep } from "../timing.js";

export interface ReportContext {
  client: MerakiTransport;
  logger: Logger;
  /** Paces per-entity loops under the API rate limit */
  sleep: Sleep;
  now: () => Date;
}

export function createContext(client: MerakiTransport, overrides: Partial<Omit<ReportContext, "client">> = {}): ReportContext {
  return {
    client,
    logger: overrides.logger ?? stderrLogger,
    sleep: overrides.sleep ?? sleep,
    now: overrides.now ?? (() => new Date()),
  };
}
