import type { Brew } from "../brew/brew.js";
import type { ArchiveRecord, BrewRecord } from "../brew/types.js";

export interface VesselSlot {
  name: string;
  brew: Brew | undefined;
}

/** A slot as written to the state file. */
export interface SerializedSlot {
  readonly name: string;
  readonly brew: BrewRecord | null;
}

export interface ExportDocument {
  readonly active: SerializedSlot[];
  readonly history: ArchiveRecord[];
}

export interface TransferReceipt {
  readonly brew: Brew;
  readonly newVolume: number;
  readonly lossPct: number;
}

export function defaultSlotName(position: number): string {
  return `Fermenter ${position}`;
}

export function defaultSlots(count: number): VesselSlot[] {
  return Array.from({ length: count }, (_, i) => ({
    name: defaultSlotName(i + 1),
    brew: undefined,
  }));
}

export function serializeSlot(slot: VesselSlot): SerializedSlot {
  return { name: slot.name, brew: slot.brew ? slot.brew.toRecord() : null };
}
