import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { runInNewContext } from "node:vm";
import { DEFAULT_STATIC_DIR } from "../src/config.js";

type ShowMessage = (text: string, kind: string) => void;
type CreateMessageBanner = (element: FakeElement, hideAfterMs: number) => ShowMessage;

/** Just enough of an HTMLElement for the banner. */
class FakeElement {
  textContent = "";
  private classes = new Set<string>();

  get className(): string {
    return [...this.classes].join(" ");
  }

  set className(value: string) {
    this.classes = new Set(value.split(" ").filter(Boolean));
  }

  readonly classList = {
    add: (name: string): void => { this.classes.add(name); },
    remove: (name: string): void => { this.classes.delete(name); },
    contains: (name: string): boolean => this.classes.has(name),
  };
}

const source = readFileSync(join(DEFAULT_STATIC_DIR, "message.js"), "utf-8");

describe("createMessageBanner", () => {
  let element: FakeElement;
  let show: ShowMessage;

  beforeEach(() => {
    vi.useFakeTimers();
    const create: CreateMessageBanner = runInNewContext(`${source}\ncreateMessageBanner`, {
      setTimeout,
      clearTimeout,
    });
    element = new FakeElement();
    element.className = "hidden";
    show = create(element, 5000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("shows the message with its kind", () => {
    show("Signed up a@mergington.edu for Chess Club", "success");

    expect(element.textContent).toBe("Signed up a@mergington.edu for Chess Club");
    expect(element.className).toBe("success");
  });

  it("hides the message after the delay", () => {
    show("Activity not found", "error");

    vi.advanceTimersByTime(4999);
    expect(element.classList.contains("hidden")).toBe(false);
    vi.advanceTimersByTime(1);
    expect(element.classList.contains("hidden")).toBe(true);
  });

  it("keeps a newer message visible when the older timer would have fired", () => {
    show("first", "success");
    vi.advanceTimersByTime(4000);
    show("second", "error");

    vi.advanceTimersByTime(2000);
    expect(element.textContent).toBe("second");
    expect(element.classList.contains("hidden")).toBe(false);

    vi.advanceTimersByTime(3000);
    expect(element.classList.contains("hidden")).toBe(true);
  });
});
