import { describe, expect, test } from "vitest";
import { MiB } from "../../config/EngineConfig";
import { InPlace, Linked, Unknown } from "../../domain/SwapLocation";
import type { Volume } from "../../domain/Volume";
import { planRelocation, type RelocationPlan } from "./RelocationPlan";

const SWAP = "/private/var/vm/swapfile";
const TARGET = "/Volumes/Ext/private/var/vm/swapfile";

const volume = (id: string, mountPath: string, isSystemVolume = false): Volume => ({
  id,
  name: id,
  mountPath,
  totalBytes: 100,
  availableBytes: 50,
  isSystemVolume,
  isPhysicalExternal: !isSystemVolume,
  hostsSwapFile: false
});

const system = volume("system", "/", true);
const ext = volume("ext", "/Volumes/Ext");

const lines = (plan: RelocationPlan) =>
  plan.steps.map((step) =>
    step._tag === "Run" ? [step.path, ...step.args].join(" ") : `remove-if-present ${step.path}`
  );

const plan = (destination: Volume, location = InPlace, newSwapFileBytes = 1024 * MiB) =>
  planRelocation({ destination, location, swapPath: SWAP, rootPath: "/", newSwapFileBytes });

describe("planRelocation to an external volume", () => {
  test("moves a file in place and links it back", () => {
    const result = plan(ext);

    expect(result.targetPath).toBe(TARGET);
    expect(lines(result)).toEqual([
      "/bin/mkdir -p /Volumes/Ext/private/var/vm",
      `remove-if-present ${TARGET}`,
      `/bin/cp ${SWAP} ${TARGET}`,
      `/bin/chmod 644 ${TARGET}`,
      `/bin/rm ${SWAP}`,
      `/bin/ln -s ${TARGET} ${SWAP}`
    ]);
  });

  test("removes the previous linked file last", () => {
    const old = "/Volumes/Old/private/var/vm/swapfile";
    const result = lines(plan(ext, Linked(old)));

    expect(result).toHaveLength(7);
    expect(result[2]).toBe(`/bin/cp ${SWAP} ${TARGET}`);
    expect(result[6]).toBe(`/bin/rm ${old}`);
  });

  test("creates a fresh file when nothing was detected", () => {
    expect(lines(plan(ext, Unknown, 512 * MiB))).toEqual([
      "/bin/mkdir -p /Volumes/Ext/private/var/vm",
      `remove-if-present ${TARGET}`,
      `/bin/dd if=/dev/zero of=${TARGET} bs=1m count=512`,
      `/bin/chmod 644 ${TARGET}`,
      `/bin/ln -s ${TARGET} ${SWAP}`
    ]);
  });

  test("rounds a partial MiB up", () => {
    const dd = lines(plan(ext, Unknown, MiB + 1))[2];
    expect(dd).toBe(`/bin/dd if=/dev/zero of=${TARGET} bs=1m count=2`);
  });
});

describe("planRelocation to the system volume", () => {
  test("drops the link and lets dynamic_pager recreate the file", () => {
    const result = plan(system, Linked(TARGET));

    expect(result.targetPath).toBe(SWAP);
    expect(lines(result)).toEqual([`/bin/rm ${SWAP}`, `/usr/sbin/dynamic_pager -F ${SWAP}`]);
  });

  test("writes a new file at the canonical path when nothing was detected", () => {
    expect(lines(plan(system, Unknown))).toEqual([
      "/bin/mkdir -p /private/var/vm",
      `/bin/dd if=/dev/zero of=${SWAP} bs=1m count=1024`,
      `/bin/chmod 644 ${SWAP}`
    ]);
  });

  test("has nothing to do when the file is already in place", () => {
    expect(plan(system, InPlace).steps).toEqual([]);
  });
});

describe("step summaries", () => {
  test("describe each elevated step", () => {
    const summaries = plan(ext).steps.flatMap((step) => (step._tag === "Run" ? [step.summary] : []));

    expect(summaries).toEqual([
      "Create /Volumes/Ext/private/var/vm",
      `Copy the swap file to ${TARGET}`,
      `Set permissions on ${TARGET}`,
      `Remove the original at ${SWAP}`,
      `Link ${SWAP} to ${TARGET}`
    ]);
  });
});
