import type { AppConfig } from "vitetags-shared";
import type { ProbeFn } from "./transport.js";

export function devServerOrigin(config: AppConfig): string {
  return `${config.devServerProtocol}://${config.devServerHost}:${config.devServerPort}/`;
}

/**
 * Decides per call whether an app is served by a live Vite dev server.
 * Nothing is cached, so a dev server starting or stopping is picked up by
 * the next render.
 */
export class DevServerProbe {
  constructor(private readonly probe: ProbeFn) {}

  async isServing(config: AppConfig): Promise<boolean> {
    if (!config.devMode) return false;
    return this.probe(devServerOrigin(config));
  }
}
