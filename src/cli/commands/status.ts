import { Command } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import { FermenterManager } from "../../fermenter/manager.js";
import { createLogger } from "../../logging/logger.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration, storage location and fermenter occupancy",
    examples: [["Show status", "fermtrack status"]],
  });

  async execute(): Promise<number> {
    const configPath = getConfigPath();
    const stateDir = getStateDir();

    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(
        `  Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    const manager = new FermenterManager({
      config,
      dataDir: stateDir,
      logger: createLogger(config.logging),
    });
    await manager.load();

    const occupied = manager.slots.filter((slot) => slot.brew).length;

    this.context.stdout.write(`Fermtrack Status\n`);
    this.context.stdout.write(`----------------\n`);
    this.context.stdout.write(`Config path: ${configPath}\n`);
    this.context.stdout.write(`State dir:   ${stateDir}\n`);
    this.context.stdout.write(`Timezone:    ${config.display.timezone}\n`);
    this.context.stdout.write(
      `Fermenters:  ${manager.slots.length} (${occupied} active, ${manager.slots.length - occupied} empty)\n`,
    );
    this.context.stdout.write(`History:     ${manager.history.length} archived\n`);
    return 0;
  }
}
