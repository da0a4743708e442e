import { Builtins, Cli } from "clipanion";
import {
  BrewArchiveCommand,
  BrewLogCommand,
  BrewNewCommand,
  BrewShowCommand,
  BrewTransferCommand,
  BrewUnlogCommand,
  BrewUpdateCommand,
} from "./commands/brew-cmd.js";
import { BrewChartCommand } from "./commands/chart-cmd.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ExportCommand } from "./commands/export-cmd.js";
import { HistoryListCommand, HistoryShowCommand } from "./commands/history-cmd.js";
import {
  SlotAddCommand,
  SlotListCommand,
  SlotRemoveCommand,
  SlotRenameCommand,
} from "./commands/slot-cmd.js";
import { StatusCommand } from "./commands/status.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Fermtrack",
    binaryName: "fermtrack",
    binaryVersion: "0.1.0",
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  // Fermenter slots
  cli.register(SlotListCommand);
  cli.register(SlotAddCommand);
  cli.register(SlotRemoveCommand);
  cli.register(SlotRenameCommand);

  // Brew lifecycle
  cli.register(BrewNewCommand);
  cli.register(BrewShowCommand);
  cli.register(BrewUpdateCommand);
  cli.register(BrewLogCommand);
  cli.register(BrewUnlogCommand);
  cli.register(BrewTransferCommand);
  cli.register(BrewArchiveCommand);
  cli.register(BrewChartCommand);

  // History + export
  cli.register(HistoryListCommand);
  cli.register(HistoryShowCommand);
  cli.register(ExportCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(StatusCommand);

  return cli;
}
