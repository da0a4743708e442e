import { Command, Option } from "clipanion";
import { parseDecimal, roundTo } from "../../brew/gravity.js";
import { validateNewBrew } from "../../brew/validation.js";
import { formatBrewDetails } from "../format.js";
import { openWorkspace, parsePosition, type Workspace } from "../workspace.js";

abstract class SlotCommand extends Command {
  position = Option.String({ name: "position", required: true });

  protected resolve(workspace: Workspace, text: string = this.position): number | undefined {
    const index = parsePosition(text, workspace.manager.slots.length);
    if (index === undefined) {
      this.context.stdout.write(`No fermenter at position ${text}\n`);
    }
    return index;
  }
}

export class BrewNewCommand extends SlotCommand {
  static override paths = [["brew", "new"]];

  static override usage = Command.Usage({
    description: "Start a new brew in a fermenter",
    examples: [
      [
        "Start a pale ale in fermenter 1",
        'fermtrack brew new 1 --name "Pale Ale" --volume 20 --og 1.050',
      ],
    ],
  });

  name = Option.String("--name", { description: "Brew name", required: true });
  category = Option.String("--category", { description: "Category (defaults to the first configured)" });
  stage = Option.String("--stage", { description: "Stage (defaults to the first configured)" });
  volume = Option.String("--volume", { description: "Starting volume in liters" });
  og = Option.String("--og", { description: "Original gravity" });
  recipe = Option.String("--recipe", { description: "Recipe text" });
  notes = Option.String("--notes", { description: "Notes" });

  async execute(): Promise<number> {
    const workspace = await openWorkspace();
    const index = this.resolve(workspace);
    if (index === undefined) return 1;

    const { manager } = workspace;
    const slot = manager.slots[index];
    if (slot?.brew) {
      this.context.stdout.write(`${slot.name} already holds ${slot.brew.name}\n`);
      return 1;
    }

    const fields = validateNewBrew({
      name: this.name,
      category: this.category,
      stage: this.stage,
      volume: this.volume,
      og: this.og,
      recipe: this.recipe,
      notes: this.notes,
    });
    if (!fields.ok) {
      this.context.stdout.write(`Invalid brew: ${fields.reason}\n`);
      return 1;
    }

    const brew = manager.newBrew(fields.value);
    await manager.createBrew(index, brew);
    this.context.stdout.write(
      `Started ${brew.name} in ${slot?.name ?? `fermenter ${index + 1}`} (${brew.id})\n`,
    );
    return 0;
  }
}

export class BrewShowCommand extends SlotCommand {
  static override paths = [["brew", "show"]];

  static override usage = Command.Usage({
    description: "Show a brew's details and event log",
    examples: [["Show fermenter 1", "fermtrack brew show 1"]],
  });

  async execute(): Promise<number> {
    const workspace = await openWorkspace();
    const index = this.resolve(workspace);
    if (index === undefined) return 1;

    const slot = workspace.manager.slots[index];
    if (!slot?.brew) {
      this.context.stdout.write(`${slot?.name ?? "Fermenter"} is empty\n`);
      return 0;
    }

    this.context.stdout.write(
      `${formatBrewDetails(slot.name, slot.brew, workspace.config.display)}\n`,
    );
    return 0;
  }
}

export class BrewUpdateCommand extends SlotCommand {
  static override paths = [["brew", "update"]];

  static override usage = Command.Usage({
    description: "Edit a brew's details and metrics",
    examples: [
      ["Record the final gravity", "fermtrack brew update 1 --fg 1.010"],
      ["Move to secondary", 'fermtrack brew update 1 --stage "Secondary"'],
    ],
  });

  name = Option.String("--name", { description: "Brew name" });
  category = Option.String("--category", { description: "Category" });
  stage = Option.String("--stage", { description: "Stage" });
  volume = Option.String("--volume", { description: "Current volume in liters" });
  og = Option.String("--og", { description: "Original gravity" });
  fg = Option.String("--fg", { description: "Final gravity" });
  ph = Option.String("--ph", { description: "Last pH reading" });
  temp = Option.String("--temp", { description: "Last temperature reading" });
  recipe = Option.String("--recipe", { description: "Recipe text" });
  notes = Option.String("--notes", { description: "Notes" });

  async execute(): Promise<number> {
    const workspace = await openWorkspace();
    const index = this.resolve(workspace);
    if (index === undefined) return 1;

    const result = await workspace.manager.updateBrew(index, {
      name: this.name,
      category: this.category,
      stage: this.stage,
      volume: this.volume,
      og: this.og,
      fg: this.fg,
      ph: this.ph,
      temp: this.temp,
      recipe: this.recipe,
      notes: this.notes,
    });
    if (!result.ok) {
      this.context.stdout.write(`Not saved: ${result.reason}\n`);
      return 1;
    }

    this.context.stdout.write(`Saved ${result.value.name}\n`);
    return 0;
  }
}

export class BrewLogCommand extends SlotCommand {
  static override paths = [["brew", "log"]];

  static override usage = Command.Usage({
    description: "Add an event to a brew's log",
    examples: [
      ["Log a gravity reading", 'fermtrack brew log 1 --type "Gravity Reading" "SG 1.020"'],
      ["Log a note", "fermtrack brew log 1 Airlock active"],
    ],
  });

  type = Option.String("--type", { description: "Event type (defaults to the first configured)" });
  text = Option.Rest({ required: 1 });

  async execute(): Promise<number> {
    const workspace = await openWorkspace();
    const index = this.resolve(workspace);
    if (index === undefined) return 1;

    const type = this.type ?? workspace.config.vocabulary.eventTypes[0] ?? "General";
    const result = await workspace.manager.logEvent(index, type, this.text.join(" "));
    if (!result.ok) {
      this.context.stdout.write(`Not logged: ${result.reason}\n`);
      return 1;
    }

    this.context.stdout.write(`Logged ${result.value.type}: ${result.value.text}\n`);
    return 0;
  }
}

export class BrewUnlogCommand extends SlotCommand {
  static override paths = [["brew", "unlog"]];

  static override usage = Command.Usage({
    description: "Delete a log entry (numbered as in `brew show`)",
    examples: [["Delete entry #3 of fermenter 1", "fermtrack brew unlog 1 3"]],
  });

  entry = Option.String({ name: "entry", required: true });

  async execute(): Promise<number> {
    const workspace = await openWorkspace();
    const index = this.resolve(workspace);
    if (index === undefined) return 1;

    const entryIndex = /^\d+$/.test(this.entry) ? Number(this.entry) - 1 : -1;
    const removed = await workspace.manager.deleteLogEntry(index, entryIndex);
    if (!removed) {
      this.context.stdout.write(`No log entry #${this.entry}\n`);
      return 1;
    }

    this.context.stdout.write(`Deleted log entry #${this.entry}\n`);
    return 0;
  }
}

export class BrewTransferCommand extends Command {
  static override paths = [["brew", "transfer"]];

  static override usage = Command.Usage({
    description: "Move a brew to an empty fermenter, recording volume loss",
    details: `
      Give either \`--loss\` (liters lost) or \`--into\` (liters that reached the
      target). With \`--into\`, any volume gain is recorded as zero loss.
    `,
    examples: [
      ["Rack 1 into 2, losing 1.5 L", "fermtrack brew transfer 1 2 --loss 1.5"],
      ["Rack 1 into 2, 18 L arrived", "fermtrack brew transfer 1 2 --into 18"],
    ],
  });

  from = Option.String({ name: "from", required: true });
  to = Option.String({ name: "to", required: true });
  loss = Option.String("--loss", { description: "Liters lost during the transfer" });
  into = Option.String("--into", { description: "Liters that reached the target" });

  async execute(): Promise<number> {
    const { manager } = await openWorkspace();
    const count = manager.slots.length;
    const src = parsePosition(this.from, count);
    const dest = parsePosition(this.to, count);
    if (src === undefined || dest === undefined) {
      const bad = src === undefined ? this.from : this.to;
      this.context.stdout.write(`No fermenter at position ${bad}\n`);
      return 1;
    }

    const volumeLoss = this.computeLoss(manager.slots[src]?.brew?.volume ?? 0);
    if (volumeLoss === undefined) {
      this.context.stdout.write("Give a numeric --loss or --into\n");
      return 1;
    }

    const result = await manager.transfer(src, dest, volumeLoss);
    if (!result.ok) {
      this.context.stdout.write(`Transfer refused: ${result.reason}\n`);
      return 1;
    }

    const { brew, newVolume, lossPct } = result.value;
    this.context.stdout.write(
      `Moved ${brew.name}: ${newVolume}L remaining (${lossPct.toFixed(1)}% loss)\n`,
    );
    return 0;
  }

  private computeLoss(currentVolume: number): number | undefined {
    if (this.into !== undefined) {
      const arrived = parseDecimal(this.into);
      return arrived === undefined ? undefined : Math.max(0, roundTo(currentVolume - arrived, 2));
    }
    return this.loss === undefined ? 0 : parseDecimal(this.loss);
  }
}

export class BrewArchiveCommand extends SlotCommand {
  static override paths = [["brew", "archive"]];

  static override usage = Command.Usage({
    description: "Move a finished brew to the history and empty its fermenter",
    examples: [["Archive fermenter 1", "fermtrack brew archive 1"]],
  });

  async execute(): Promise<number> {
    const workspace = await openWorkspace();
    const index = this.resolve(workspace);
    if (index === undefined) return 1;

    const result = await workspace.manager.archiveBrew(index);
    if (!result.ok) {
      this.context.stdout.write(`Archive failed: ${result.reason}\n`);
      return 1;
    }
    if (!result.value) {
      this.context.stdout.write("Nothing to archive: fermenter is empty\n");
      return 0;
    }

    this.context.stdout.write(
      `Archived ${result.value.name} from ${result.value.archived_from}\n`,
    );
    return 0;
  }
}
