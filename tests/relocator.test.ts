/**
 * Unit tests for the payload relocator.
 */
import { describe, test, expect } from "vitest";
import { PayloadRelocator } from "../src/core/relocator.js";
import { MemoryStorage, RecordingLogger } from "./fixtures.js";

const WORK = "/work";
const DEST = "/out/item";

function setup() {
  const storage = new MemoryStorage();
  const logger = new RecordingLogger();
  const relocator = new PayloadRelocator({ storage, logger });
  return { storage, logger, relocator };
}

describe("PayloadRelocator", () => {
  test("moves payload flattened, leaves segments and archives", async () => {
    const { storage, relocator } = setup();
    await storage.write(`${WORK}/a/b/photo.jpg`, "jpg");
    await storage.write(`${WORK}/notes.txt`, "txt");
    await storage.write(`${WORK}/movie.7z.002`, "");
    await storage.write(`${WORK}/show.r01`, "");
    await storage.write(`${WORK}/show.z01`, "");
    await storage.write(`${WORK}/left.rar`, "");
    await storage.write(`${WORK}/first.7z.001`, "");

    const result = await relocator.relocate(WORK, DEST);

    expect(result).toEqual({ moved: 2, skippedSegments: 4, skippedArchives: 1, failed: 0 });
    expect(await storage.list(DEST)).toEqual([`${DEST}/notes.txt`, `${DEST}/photo.jpg`]);
    expect(storage.text(`${DEST}/photo.jpg`)).toBe("jpg");
    expect(await storage.list(WORK)).toEqual([
      `${WORK}/first.7z.001`,
      `${WORK}/left.rar`,
      `${WORK}/movie.7z.002`,
      `${WORK}/show.r01`,
      `${WORK}/show.z01`,
    ]);
  });

  test("logs skipped core archives", async () => {
    const { storage, logger, relocator } = setup();
    await storage.write(`${WORK}/left.zip`, "");

    await relocator.relocate(WORK, DEST);

    expect(logger.lines).toEqual([`INFO Skipping core archive: ${WORK}/left.zip`]);
  });

  test("name collisions get a numeric suffix", async () => {
    const { storage, relocator } = setup();
    await storage.write(`${DEST}/cover.jpg`, "existing");
    await storage.write(`${WORK}/a/cover.jpg`, "first");
    await storage.write(`${WORK}/b/cover.jpg`, "second");

    const result = await relocator.relocate(WORK, DEST);

    expect(result.moved).toBe(2);
    expect(storage.text(`${DEST}/cover.jpg`)).toBe("existing");
    expect(storage.text(`${DEST}/cover (2).jpg`)).toBe("first");
    expect(storage.text(`${DEST}/cover (3).jpg`)).toBe("second");
  });

  test("a failed move does not stop the rest", async () => {
    const { storage, logger, relocator } = setup();
    await storage.write(`${WORK}/a.txt`, "a");
    await storage.write(`${WORK}/b.txt`, "b");
    storage.unmovable.add(`${WORK}/a.txt`);

    const result = await relocator.relocate(WORK, DEST);

    expect(result.moved).toBe(1);
    expect(result.failed).toBe(1);
    expect(storage.text(`${DEST}/b.txt`)).toBe("b");
    expect(logger.matching("ERROR")).toEqual([
      `ERROR Could not move ${WORK}/a.txt: Error: EACCES: ${WORK}/a.txt`,
    ]);
  });

  test("empty workspace creates the destination and moves nothing", async () => {
    const { storage, relocator } = setup();

    const result = await relocator.relocate(WORK, DEST);

    expect(result.moved).toBe(0);
    expect(await storage.isDirectory(DEST)).toBe(true);
  });
});
