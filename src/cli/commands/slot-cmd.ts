import { Command, Option } from "clipanion";
import { formatSlotLine } from "../format.js";
import { openWorkspace, parsePosition } from "../workspace.js";

export class SlotListCommand extends Command {
  static override paths = [["slots", "list"], ["slots"]];

  static override usage = Command.Usage({
    description: "List fermenter slots and what they hold",
    examples: [["List all fermenters", "fermtrack slots list"]],
  });

  async execute(): Promise<void> {
    const { manager } = await openWorkspace();
    const slots = manager.slots;

    if (slots.length === 0) {
      this.context.stdout.write("No fermenters configured.\n");
      return;
    }

    this.context.stdout.write(`Fermenters (${slots.length}):\n`);
    slots.forEach((slot, i) => {
      this.context.stdout.write(`${formatSlotLine(slot, i + 1)}\n`);
    });
  }
}

export class SlotAddCommand extends Command {
  static override paths = [["slots", "add"]];

  static override usage = Command.Usage({
    description: "Add an empty fermenter at the end",
    examples: [["Add a fermenter", "fermtrack slots add"]],
  });

  async execute(): Promise<void> {
    const { manager } = await openWorkspace();
    const slot = await manager.addSlot();
    this.context.stdout.write(`Added ${slot.name} (position ${manager.slots.length})\n`);
  }
}

export class SlotRemoveCommand extends Command {
  static override paths = [["slots", "remove"]];

  static override usage = Command.Usage({
    description: "Remove the last fermenter (only when it is empty)",
    examples: [["Remove the last fermenter", "fermtrack slots remove"]],
  });

  async execute(): Promise<number> {
    const { manager } = await openWorkspace();
    const last = manager.slots.at(-1);

    if (!(await manager.removeLastSlot())) {
      this.context.stdout.write("Cannot remove. Ensure the last fermenter is empty.\n");
      return 1;
    }

    this.context.stdout.write(`Removed ${last?.name ?? "fermenter"}\n`);
    return 0;
  }
}

export class SlotRenameCommand extends Command {
  static override paths = [["slots", "rename"]];

  static override usage = Command.Usage({
    description: "Rename a fermenter",
    examples: [["Rename the second fermenter", 'fermtrack slots rename 2 "Carboy B"']],
  });

  position = Option.String({ name: "position", required: true });
  name = Option.String({ name: "name", required: true });

  async execute(): Promise<number> {
    const { manager } = await openWorkspace();
    const index = parsePosition(this.position, manager.slots.length);
    if (index === undefined) {
      this.context.stdout.write(`No fermenter at position ${this.position}\n`);
      return 1;
    }

    const name = this.name.trim();
    if (!name) {
      this.context.stdout.write("Name is required\n");
      return 1;
    }

    await manager.renameSlot(index, name);
    this.context.stdout.write(`Renamed fermenter ${index + 1} to ${name}\n`);
    return 0;
  }
}
