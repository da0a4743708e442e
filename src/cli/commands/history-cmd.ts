import { Command, Option } from "clipanion";
import { formatArchiveReport } from "../../brew/report.js";
import { formatLocal } from "../../utils/time.js";
import { openWorkspace } from "../workspace.js";

export class HistoryListCommand extends Command {
  static override paths = [["history", "list"], ["history"]];

  static override usage = Command.Usage({
    description: "List archived brews, newest first",
    examples: [["List history", "fermtrack history list"]],
  });

  async execute(): Promise<void> {
    const { manager, config } = await openWorkspace();
    const records = manager.history;

    if (records.length === 0) {
      this.context.stdout.write("No archived brews.\n");
      return;
    }

    this.context.stdout.write(`Archived brews (${records.length}):\n`);
    records.forEach((record, i) => {
      this.context.stdout.write(
        `  ${i + 1}. ${formatLocal(record.start_date, config.display)}  ${record.name}` +
          `  (from ${record.archived_from})\n`,
      );
    });
  }
}

export class HistoryShowCommand extends Command {
  static override paths = [["history", "show"]];

  static override usage = Command.Usage({
    description: "Show the full record of an archived brew",
    examples: [["Show the most recent archive", "fermtrack history show 1"]],
  });

  entry = Option.String({ name: "entry", required: true });

  async execute(): Promise<number> {
    const { manager, config } = await openWorkspace();
    const record = /^\d+$/.test(this.entry)
      ? manager.history[Number(this.entry) - 1]
      : undefined;

    if (!record) {
      this.context.stdout.write(`No archived brew #${this.entry}\n`);
      return 1;
    }

    this.context.stdout.write(`${formatArchiveReport(record, config.display)}\n`);
    return 0;
  }
}
