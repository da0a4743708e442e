import type { Brew } from "../brew/brew.js";
import type { DisplayConfig } from "../config/types.js";
import type { VesselSlot } from "../fermenter/types.js";
import { formatLocal, humanElapsed } from "../utils/time.js";

export function formatAbv(abv: number | undefined): string {
  return abv === undefined ? "-" : `${abv.toFixed(2)}%`;
}

export function formatSlotLine(slot: VesselSlot, position: number): string {
  const brew = slot.brew;
  if (!brew) return `  ${position}. ${slot.name}: empty`;
  return (
    `  ${position}. ${slot.name}: ${brew.name} [${brew.category} / ${brew.stage}] ` +
    `${brew.volume}L, ABV ${formatAbv(brew.getAbv())}, age ${humanElapsed(brew.startDate)}`
  );
}

export function formatBrewDetails(slotName: string, brew: Brew, display: DisplayConfig): string {
  const lines = [
    `${slotName}: ${brew.name}`,
    `  ID:        ${brew.id}`,
    `  Category:  ${brew.category}`,
    `  Stage:     ${brew.stage}`,
    `  Started:   ${formatLocal(brew.startDate, display)} (${humanElapsed(brew.startDate)})`,
    `  Volume:    ${brew.volume} L (original ${brew.originalVolume} L)`,
    `  OG / FG:   ${brew.og.toFixed(3)} / ${brew.fg.toFixed(3)}`,
    `  ABV:       ${formatAbv(brew.getAbv())}`,
    `  pH:        ${brew.ph}`,
    `  Temp:      ${brew.temp}`,
  ];
  if (brew.recipe) lines.push(`  Recipe:    ${brew.recipe}`);
  if (brew.notes) lines.push(`  Notes:     ${brew.notes}`);

  lines.push(`Log (${brew.log.length}, newest first):`);
  for (let i = brew.log.length - 1; i >= 0; i--) {
    const entry = brew.log[i];
    if (!entry) continue;
    lines.push(`  #${i + 1} [${formatLocal(entry.time, display)}] ${entry.type}: ${entry.text}`);
  }
  return lines.join("\n");
}
