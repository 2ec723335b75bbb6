import { describe, it, expect } from "vitest";
import { mouseEvent } from "../src/index.js";

describe("mouseEvent", () => {
  it("converts 1-based terminal positions to 0-based cells", () => {
    expect(mouseEvent("MOUSE_LEFT_BUTTON_PRESSED", { x: 5, y: 3, shift: true })).toEqual({
      type: "press",
      x: 4,
      y: 2,
      shift: true,
    });
    expect(mouseEvent("MOUSE_DRAG", { x: 1, y: 1 })).toEqual({ type: "drag", x: 0, y: 0, shift: false });
  });

  it("maps release and wheel events", () => {
    expect(mouseEvent("MOUSE_LEFT_BUTTON_RELEASED", { x: 2, y: 2 })).toEqual({ type: "release" });
    expect(mouseEvent("MOUSE_WHEEL_UP", { x: 2, y: 2 })).toEqual({ type: "scroll", direction: "up" });
    expect(mouseEvent("MOUSE_WHEEL_DOWN", { x: 2, y: 2 })).toEqual({ type: "scroll", direction: "down" });
  });

  it("ignores other mouse events", () => {
    expect(mouseEvent("MOUSE_MOTION", { x: 2, y: 2 })).toBeNull();
    expect(mouseEvent("MOUSE_RIGHT_BUTTON_PRESSED", { x: 2, y: 2 })).toBeNull();
  });
});
