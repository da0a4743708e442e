import { writeFile } from "node:fs/promises";
import { Brew } from "../brew/brew.js";
import { roundTo } from "../brew/gravity.js";
import type { ArchiveRecord, BrewFields, LogEntry } from "../brew/types.js";
import {
  ok,
  reject,
  validateBrewDetails,
  type BrewDetailsInput,
  type Outcome,
} from "../brew/validation.js";
import type { FermtrackConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { HistoryStore } from "./history-store.js";
import { SlotStore } from "./slot-store.js";
import {
  defaultSlotName,
  serializeSlot,
  type ExportDocument,
  type TransferReceipt,
  type VesselSlot,
} from "./types.js";

export interface FermenterManagerOptions {
  readonly config: FermtrackConfig;
  readonly dataDir: string;
  readonly logger: Logger;
}

/**
 * Owns the vessel slots and the archive history. Every mutation is written
 * through to disk before the returned promise settles.
 */
export class FermenterManager {
  private readonly config: FermtrackConfig;
  private readonly logger: Logger;
  private readonly slotStore: SlotStore;
  private readonly historyStore: HistoryStore;

  private slotList: VesselSlot[] = [];
  private records: ArchiveRecord[] = [];

  constructor(options: FermenterManagerOptions) {
    this.config = options.config;
    this.logger = options.logger.child({ component: "fermenter-manager" });
    this.slotStore = new SlotStore(options.dataDir, this.config.storage.stateFile, options.logger);
    this.historyStore = new HistoryStore(
      options.dataDir,
      this.config.storage.historyFile,
      options.logger,
    );
  }

  get slots(): readonly VesselSlot[] {
    return this.slotList;
  }

  get history(): readonly ArchiveRecord[] {
    return this.records;
  }

  slot(index: number): VesselSlot | undefined {
    return Number.isInteger(index) ? this.slotList[index] : undefined;
  }

  async load(): Promise<void> {
    this.slotList = await this.slotStore.load({
      defaultCount: this.config.slots.defaultCount,
      vocabulary: this.config.vocabulary,
    });
    this.records = await this.historyStore.load();
    this.logger.debug(
      { slots: this.slotList.length, history: this.records.length },
      "State loaded",
    );
  }

  async save(): Promise<void> {
    await this.slotStore.save(this.slotList);
  }

  /** Builds a brew whose category and stage default from the configured vocabulary. */
  newBrew(fields: BrewFields = {}): Brew {
    return Brew.create(fields, this.config.vocabulary);
  }

  async addSlot(): Promise<VesselSlot> {
    const slot: VesselSlot = { name: defaultSlotName(this.slotList.length + 1), brew: undefined };
    this.slotList.push(slot);
    await this.save();
    this.logger.info({ slot: slot.name }, "Slot added");
    return slot;
  }

  async removeLastSlot(): Promise<boolean> {
    const last = this.slotList.at(-1);
    if (!last || last.brew) return false;

    this.slotList.pop();
    await this.save();
    this.logger.info({ slot: last.name }, "Slot removed");
    return true;
  }

  async renameSlot(index: number, name: string): Promise<boolean> {
    const slot = this.slot(index);
    if (!slot) return false;

    slot.name = name;
    await this.save();
    return true;
  }

  async createBrew(index: number, brew: Brew): Promise<boolean> {
    const slot = this.slot(index);
    if (!slot) return false;

    slot.brew = brew;
    await this.save();
    this.logger.info({ slot: slot.name, brew: brew.id }, "Brew created");
    return true;
  }

  async logEvent(index: number, type: string, text: string): Promise<Outcome<LogEntry>> {
    const brew = this.slot(index)?.brew;
    if (!brew) return reject("No brew in this fermenter");
    if (!text.trim()) return reject("Event text is required");

    const entry = brew.addEvent(type, text);
    await this.save();
    return ok(entry);
  }

  async updateBrew(index: number, input: BrewDetailsInput): Promise<Outcome<Brew>> {
    const brew = this.slot(index)?.brew;
    if (!brew) return reject("No brew in this fermenter");

    const details = validateBrewDetails(input);
    if (!details.ok) return details;

    brew.applyDetails(details.value);
    await this.save();
    return ok(brew);
  }

  /**
   * Moves a brew into the history. The slot is only cleared once the history
   * file has been replaced; a failed write leaves slot, brew and history as
   * they were.
   */
  async archiveBrew(index: number): Promise<Outcome<ArchiveRecord | undefined>> {
    const slot = this.slot(index);
    if (!slot) return reject(`No fermenter at position ${index + 1}`);

    const brew = slot.brew;
    if (!brew) {
      await this.save();
      return ok(undefined);
    }

    brew.addEvent("Lifecycle", "Archived to History");
    const record: ArchiveRecord = { ...brew.toRecord(), archived_from: slot.name };
    const next = [record, ...this.records];

    try {
      await this.historyStore.save(next);
    } catch (err) {
      brew.removeLogEntry(brew.log.length - 1);
      this.logger.error({ err, brew: brew.id }, "Failed to write history");
      return reject(`Could not save history: ${err instanceof Error ? err.message : String(err)}`);
    }

    this.records = next;
    slot.brew = undefined;
    await this.save();
    this.logger.info({ slot: slot.name, brew: brew.id }, "Brew archived");
    return ok(record);
  }

  async transfer(
    srcIndex: number,
    destIndex: number,
    volumeLoss: number,
  ): Promise<Outcome<TransferReceipt>> {
    const src = this.slot(srcIndex);
    const dest = this.slot(destIndex);
    if (!src) return reject(`No fermenter at position ${srcIndex + 1}`);
    if (!dest) return reject(`No fermenter at position ${destIndex + 1}`);
    if (src === dest) return reject("Source and destination are the same fermenter");

    const brew = src.brew;
    if (!brew) return reject(`${src.name} is empty`);
    if (dest.brew) return reject(`${dest.name} must be empty`);

    const oldVolume = brew.volume;
    if (!Number.isFinite(volumeLoss)) return reject("Volume loss must be a number");
    if (volumeLoss < 0) return reject("Volume loss cannot be negative");
    if (volumeLoss > oldVolume) {
      return reject(`Volume loss ${volumeLoss}L exceeds current volume ${oldVolume}L`);
    }

    const newVolume = roundTo(oldVolume - volumeLoss, 2);
    const lossPct = oldVolume > 0 ? (volumeLoss / oldVolume) * 100 : 0;

    brew.volume = newVolume;
    brew.addEvent(
      "Transfer",
      `Transferred ${src.name} -> ${dest.name}. ` +
        `Loss: ${volumeLoss}L (${lossPct.toFixed(1)}%). New Vol: ${newVolume}L`,
    );

    src.brew = undefined;
    dest.brew = brew;
    await this.save();
    this.logger.info({ from: src.name, to: dest.name, brew: brew.id, volumeLoss }, "Brew transferred");
    return ok({ brew, newVolume, lossPct });
  }

  async deleteLogEntry(slotIndex: number, logIndex: number): Promise<boolean> {
    const removed = this.slot(slotIndex)?.brew?.removeLogEntry(logIndex) ?? false;
    await this.save();
    return removed;
  }

  snapshot(): ExportDocument {
    return {
      active: this.slotList.map(serializeSlot),
      history: [...this.records],
    };
  }

  async exportTo(path: string): Promise<void> {
    await writeFile(path, JSON.stringify(this.snapshot(), null, 2));
    this.logger.info({ path }, "Exported state");
  }
}
