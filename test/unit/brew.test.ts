import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Brew } from "../../src/brew/brew.js";
import { parseBrewFields } from "../../src/brew/schema.js";

describe("Brew.create", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-03-01T10:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fills defaults and synthesizes the creation event", () => {
    const brew = Brew.create();
    expect(brew.id).toBe(`brew_${Date.parse("2024-03-01T10:00:00Z")}`);
    expect(brew.name).toBe("Untitled");
    expect(brew.category).toBe("Beer");
    expect(brew.stage).toBe("Primary");
    expect(brew.recipe).toBe("");
    expect(brew.notes).toBe("");
    expect(brew.startDate).toBe("2024-03-01T10:00:00.000Z");
    expect(brew.volume).toBe(0);
    expect(brew.originalVolume).toBe(0);
    expect([brew.og, brew.fg, brew.ph, brew.temp]).toEqual([0, 0, 0, 0]);
    expect(brew.log).toEqual([
      {
        time: "2024-03-01T10:00:00.000Z",
        type: "Lifecycle",
        text: "Created: Untitled. Start Vol: 0L",
      },
    ]);
  });

  it("takes category and stage defaults from the vocabulary", () => {
    const brew = Brew.create(
      { name: "Orchard" },
      { categories: ["Cider", "Wine"], stages: ["Primary Ferment"] },
    );
    expect(brew.category).toBe("Cider");
    expect(brew.stage).toBe("Primary Ferment");
  });

  it("uses hardcoded fallbacks when the vocabulary is empty", () => {
    const brew = Brew.create({}, { categories: [], stages: [] });
    expect(brew.category).toBe("Beer");
    expect(brew.stage).toBe("Primary");
  });

  it("accepts categories outside the vocabulary", () => {
    const brew = Brew.create({ category: "Sake" }, { categories: ["Beer"], stages: [] });
    expect(brew.category).toBe("Sake");
  });

  it("captures original volume from the starting volume", () => {
    const brew = Brew.create({ name: "Stout", volume: 23 });
    expect(brew.originalVolume).toBe(23);
    expect(brew.log[0]?.text).toBe("Created: Stout. Start Vol: 23L");
  });

  it("keeps a supplied log without adding a creation event", () => {
    const log = [{ time: "2024-01-01T00:00:00.000Z", type: "General", text: "Pitched yeast" }];
    const brew = Brew.create({ log });
    expect(brew.log).toEqual(log);
  });
});

describe("Brew events", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("appends timestamped entries in order", () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-03-01T10:00:00Z"));
    const brew = Brew.create({ name: "Mead" });

    vi.setSystemTime(new Date("2024-03-02T08:00:00Z"));
    const entry = brew.addEvent("Nutrient Addition", "2g Fermaid-O");

    expect(entry).toEqual({
      time: "2024-03-02T08:00:00.000Z",
      type: "Nutrient Addition",
      text: "2g Fermaid-O",
    });
    expect(brew.log.map((e) => e.type)).toEqual(["Lifecycle", "Nutrient Addition"]);
  });

  it("removes entries by index and ignores out-of-range indices", () => {
    const brew = Brew.create();
    brew.addEvent("General", "one");
    brew.addEvent("General", "two");

    expect(brew.removeLogEntry(5)).toBe(false);
    expect(brew.removeLogEntry(-1)).toBe(false);
    expect(brew.removeLogEntry(1.5)).toBe(false);
    expect(brew.log).toHaveLength(3);

    expect(brew.removeLogEntry(1)).toBe(true);
    expect(brew.log.map((e) => e.text)).toEqual([brew.log[0]?.text, "two"]);
  });
});

describe("Brew.getAbv", () => {
  it("returns undefined until both gravities are recorded", () => {
    expect(Brew.create({ og: 1.05 }).getAbv()).toBeUndefined();
    expect(Brew.create({ fg: 1.01 }).getAbv()).toBeUndefined();
  });

  it("computes ABV when both gravities are present", () => {
    expect(Brew.create({ og: 1.05, fg: 1.01 }).getAbv()).toBe(5.34);
  });

  it("returns zero, not undefined, when fg is above og", () => {
    expect(Brew.create({ og: 1.01, fg: 1.02 }).getAbv()).toBe(0);
  });
});

describe("Brew.applyDetails", () => {
  it("writes only the supplied fields", () => {
    const brew = Brew.create({ name: "Saison", volume: 20, og: 1.06 });
    brew.applyDetails({ stage: "Secondary", fg: 1.004, volume: 19 });
    expect(brew.name).toBe("Saison");
    expect(brew.stage).toBe("Secondary");
    expect(brew.fg).toBe(1.004);
    expect(brew.volume).toBe(19);
    expect(brew.originalVolume).toBe(20);
  });
});

describe("Brew records", () => {
  it("round-trips every field, log order included", () => {
    const brew = Brew.create({
      name: "Blackberry Melomel",
      category: "Mead",
      recipe: "3 kg honey, 1 kg blackberries",
      notes: "Staggered nutrients",
      stage: "Aging",
      volume: 9.5,
      original_volume: 11,
      og: 1.11,
      fg: 1.008,
      ph: 3.6,
      temp: 19.5,
    });
    brew.addEvent("Gravity Reading", "SG 1.040");
    brew.addEvent("Fruit Removal", "Pulled the bag");

    const record = brew.toRecord();
    const copy = Brew.fromRecord(parseBrewFields(JSON.parse(JSON.stringify(record)) as unknown));

    expect(copy.toRecord()).toEqual(record);
    expect(copy.log.map((e) => e.text)).toEqual([
      "Created: Blackberry Melomel. Start Vol: 9.5L",
      "SG 1.040",
      "Pulled the bag",
    ]);
  });

  it("does not share the log array with its record", () => {
    const brew = Brew.create();
    const record = brew.toRecord();
    brew.addEvent("General", "later");
    expect(record.log).toHaveLength(1);
  });

  it("drops unknown keys and coerces what it can read", () => {
    expect(parseBrewFields({ name: "Ale", colour: "amber" })).toEqual({ name: "Ale" });
    expect(parseBrewFields({ og: "1.060", fg: 1.01, volume: "twenty" })).toEqual({
      og: 1.06,
      fg: 1.01,
      volume: undefined,
    });
    expect(parseBrewFields({ name: 7, log: [{ text: "kept" }, "noise"] })).toEqual({
      name: "7",
      log: [{ time: "", type: "General", text: "kept" }],
    });
  });

  it("rejects a value that is not a mapping", () => {
    expect(() => parseBrewFields(42)).toThrow();
    expect(() => parseBrewFields(null)).toThrow();
  });
});
