import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";

import { main as buildAndEncode } from "../examples/01-build-and-encode";
import { main as decodeTurtle } from "../examples/02-decode-turtle";
import { main as classExpressions } from "../examples/03-class-expressions";
import { main as indexAndTransport } from "../examples/04-index-and-transport";

const EXAMPLES = [
  { name: "01-build-and-encode", main: buildAndEncode },
  { name: "02-decode-turtle", main: decodeTurtle },
  { name: "03-class-expressions", main: classExpressions },
  { name: "04-index-and-transport", main: indexAndTransport },
] as const;

describe("examples", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  for (const { name, main } of EXAMPLES) {
    it(`${name} runs without error`, async () => {
      await expect(main()).resolves.toBeUndefined();
    });
  }

  it("02-decode-turtle reports the unrecognized node", async () => {
    await decodeTurtle();
    const lines = consoleLogSpy.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain("Warnings: 1");
  });

  it("04-index-and-transport restores an equal ontology", async () => {
    await indexAndTransport();
    const lines = consoleLogSpy.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain("  restored equal: true");
    expect(lines).toContain("  index current after edit: false");
  });
});
