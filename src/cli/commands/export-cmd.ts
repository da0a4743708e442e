import { resolve } from "node:path";
import { Command, Option } from "clipanion";
import { openWorkspace } from "../workspace.js";

export class ExportCommand extends Command {
  static override paths = [["export"]];

  static override usage = Command.Usage({
    description: "Write active fermenters and history to one JSON file",
    examples: [["Back up everything", "fermtrack export ./fermtrack-backup.json"]],
  });

  target = Option.String({ name: "path", required: true });

  async execute(): Promise<void> {
    const { manager } = await openWorkspace();
    const path = resolve(this.target);
    await manager.exportTo(path);
    this.context.stdout.write(
      `Exported ${manager.slots.length} fermenters and ${manager.history.length} archived brews to ${path}\n`,
    );
  }
}
