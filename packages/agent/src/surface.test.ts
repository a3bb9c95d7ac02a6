import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { UiNode } from "@pumpscreen/diabetes";
import { defaultKeywords } from "@pumpscreen/reader";
import type { UiHost } from "./host.js";
import { acquireSurface, closeSurface } from "./surface.js";

function node(fields: Partial<Omit<UiNode, "children">> = {}, ...children: UiNode[]): UiNode {
  return {
    text: null,
    contentDescription: null,
    className: null,
    viewId: null,
    clickable: false,
    ...fields,
    children,
  };
}

function fakeHost(roots: Array<UiNode | null>): UiHost & { click: ReturnType<typeof vi.fn>; back: ReturnType<typeof vi.fn> } {
  let index = 0;
  return {
    getRootNode: async () => roots[Math.min(index++, roots.length - 1)],
    click: vi.fn().mockResolvedValue(true),
    back: vi.fn().mockResolvedValue(undefined),
    captureScreen: async () => null,
  };
}

describe("acquireSurface", () => {
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    sleep.mockClear();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the first available root without waiting", async () => {
    const root = node({ text: "ready" });
    expect(await acquireSurface(fakeHost([root]), { sleep })).toBe(root);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries until the predicate accepts the surface", async () => {
    const loading = node({ text: "loading" });
    const ready = node({ text: "ready" });
    const host = fakeHost([null, loading, ready]);

    const root = await acquireSurface(host, { sleep, accept: (r) => r.text === "ready" });

    expect(root).toBe(ready);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("returns null after the attempts run out", async () => {
    const root = await acquireSurface(fakeHost([null]), { sleep, attempts: 2, retryDelayMs: 10 });
    expect(root).toBeNull();
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10);
  });
});

describe("closeSurface", () => {
  const keywords = defaultKeywords();

  it("clicks the first control found", async () => {
    const back = node({ contentDescription: "Navigate up", clickable: true });
    const host = fakeHost([]);

    await closeSurface(host, node({}, back), ["close", "back"], keywords);

    expect(host.click).toHaveBeenCalledWith(back);
    expect(host.back).not.toHaveBeenCalled();
  });

  it("navigates back when no control is found", async () => {
    const host = fakeHost([]);
    await closeSurface(host, node({}, node({ text: "Sensor" })), ["close"], keywords);
    expect(host.back).toHaveBeenCalledTimes(1);
  });

  it("navigates back when the click is refused", async () => {
    const host = fakeHost([]);
    host.click.mockResolvedValue(false);

    await closeSurface(host, node({}, node({ text: "x", clickable: true })), ["close"], keywords);

    expect(host.click).toHaveBeenCalledTimes(1);
    expect(host.back).toHaveBeenCalledTimes(1);
  });

  it("navigates back without a surface", async () => {
    const host = fakeHost([]);
    await closeSurface(host, null, ["close"], keywords);
    expect(host.back).toHaveBeenCalledTimes(1);
  });
});
