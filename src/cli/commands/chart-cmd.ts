import { Command, Option } from "clipanion";
import { extractGravitySeries, extractTemperatureSeries } from "../../brew/series.js";
import { formatLocal } from "../../utils/time.js";
import { openWorkspace, parsePosition } from "../workspace.js";

export class BrewChartCommand extends Command {
  static override paths = [["brew", "chart"]];

  static override usage = Command.Usage({
    description: "Print the gravity and temperature series mined from a brew's log",
    examples: [["Chart fermenter 1", "fermtrack brew chart 1"]],
  });

  position = Option.String({ name: "position", required: true });

  async execute(): Promise<number> {
    const { manager, config } = await openWorkspace();
    const index = parsePosition(this.position, manager.slots.length);
    const brew = index === undefined ? undefined : manager.slots[index]?.brew;
    if (!brew) {
      this.context.stdout.write(`No brew at position ${this.position}\n`);
      return 1;
    }

    const gravity = extractGravitySeries(brew);
    const temperature = extractTemperatureSeries(brew);
    const out = this.context.stdout;

    out.write(`Gravity (${gravity.length}):\n`);
    if (gravity.length === 0) out.write("  (no readings)\n");
    for (const point of gravity) {
      out.write(
        `  ${formatLocal(point.time, config.display)}  ${point.value.toFixed(3)}  ${point.label}\n`,
      );
    }

    out.write(`Temperature (${temperature.length}):\n`);
    if (temperature.length === 0) out.write("  (no readings)\n");
    for (const point of temperature) {
      out.write(`  ${formatLocal(point.time, config.display)}  ${point.value}\n`);
    }
    return 0;
  }
}
