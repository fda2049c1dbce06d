/**
 * Build the process logger registry from configuration.
 */
import { ConsoleHandler, FileHandler, FORMATS } from "./handlers.js";
import type { FormatName } from "./handlers.js";
import { LevelTable } from "./levels.js";
import { LoggerRegistry } from "./logger.js";

/** The configuration fields the registry is built from. */
export interface RegistrySettings {
  defaultLevel: string;
  format: FormatName;
  fileOutput: boolean;
  logDir: string;
  levels: Record<string, number>;
}

export function createRegistry(settings: RegistrySettings): LoggerRegistry {
  const levels = new LevelTable();
  for (const [name, value] of Object.entries(settings.levels)) {
    levels.addLevelName(value, name);
  }

  const registry = new LoggerRegistry({
    levels,
    defaultLevel: levels.parse(settings.defaultLevel),
  });

  registry.root.addHandler(new ConsoleHandler({ format: FORMATS[settings.format] }));
  if (settings.fileOutput) {
    registry.root.addHandler(new FileHandler({ logDir: settings.logDir }));
  }

  return registry;
}
