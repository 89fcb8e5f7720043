import Decimal from "decimal.js";
import { describe, it, expect, beforeEach } from "vitest";
import { PositionManager } from "../src/positionManager";
import { evaluateSignal } from "../src/signal";

const settings = {
  optionsQtyPerTrade: 90,
  closeThreshold: 0.01,
  scaleStep: 0.02,
  profitTargetFraction: 1,
  maxOptionPosition: 270
};

const ID = "RTM50C";

function context(quantity: number, magnitude: number, mid = 1) {
  return {
    instrumentId: ID,
    quantity: new Decimal(quantity),
    averagePrice: null,
    signal: evaluateSignal(magnitude, 0, 0.04),
    mid: new Decimal(mid)
  };
}

describe("PositionManager", () => {
  let manager: PositionManager;

  beforeEach(() => {
    manager = new PositionManager(settings);
  });

  it("stays flat without a signal", () => {
    const decision = manager.step(context(0, 0.02));
    expect(decision).toMatchObject({ from: "FLAT", to: "FLAT", order: null, reason: "idle" });
  });

  it("opens a long position on a long signal", () => {
    const decision = manager.step(context(0, 0.05));
    expect(decision.to).toBe("OPENING");
    expect(decision.reason).toBe("open_long");
    expect(decision.order?.quantity.toNumber()).toBe(90);
    expect(decision.order?.type).toBe("market");
  });

  it("moves to HELD once the fill shows up and holds on a steady signal", () => {
    manager.step(context(0, 0.05));
    const decision = manager.step(context(90, 0.05));
    expect(decision).toMatchObject({ from: "HELD", to: "HELD", order: null, reason: "hold" });
  });

  it("returns to FLAT when the opening order did not fill", () => {
    manager.step(context(0, 0.05));
    const decision = manager.step(context(0, 0.02));
    expect(decision).toMatchObject({ from: "FLAT", to: "FLAT", reason: "idle" });
  });

  it("scales when the mispricing widens by the step", () => {
    manager.step(context(0, 0.05));
    const decision = manager.step(context(90, 0.08));
    expect(decision.to).toBe("SCALING");
    expect(decision.reason).toBe("scale");
    expect(decision.order?.quantity.toNumber()).toBe(90);
    expect(manager.recordOf(ID).scaleBase.toNumber()).toBe(0.08);
  });

  it("sizes a scale to the remaining room and stops at the cap", () => {
    manager.step(context(0, 0.05));
    const partial = manager.step(context(200, 0.08));
    expect(partial.order?.quantity.toNumber()).toBe(70);

    const capped = manager.step(context(270, 0.11));
    expect(capped).toMatchObject({ from: "HELD", to: "HELD", order: null, reason: "max_position" });
  });

  it("unwinds when the mispricing converges", () => {
    manager.step(context(0, 0.05));
    const decision = manager.step(context(90, 0.005));
    expect(decision.to).toBe("UNWINDING");
    expect(decision.reason).toBe("converged");
    expect(decision.order?.quantity.toNumber()).toBe(-90);
  });

  it("unwinds when the signal reverses", () => {
    manager.step(context(0, 0.05));
    const decision = manager.step(context(90, -0.02));
    expect(decision.reason).toBe("reversed");
    expect(decision.order?.quantity.toNumber()).toBe(-90);
  });

  it("unwinds once the captured move reaches the entry mispricing", () => {
    manager.step(context(0, 0.05, 1.0));
    const decision = manager.step(context(90, 0.03, 1.06));
    expect(decision.reason).toBe("target_met");
    expect(decision.to).toBe("UNWINDING");
  });

  it("measures the target against the average price when known", () => {
    manager.step(context(0, 0.05, 1.0));
    const decision = manager.step({ ...context(90, 0.03, 1.06), averagePrice: new Decimal(1.02) });
    expect(decision.reason).toBe("hold");
  });

  it("keeps unwinding the remainder of a partial fill", () => {
    manager.step(context(0, 0.05));
    manager.step(context(90, 0.005));
    const remainder = manager.step(context(40, 0.06));
    expect(remainder).toMatchObject({ from: "UNWINDING", to: "UNWINDING", reason: "unwind_remaining" });
    expect(remainder.order?.quantity.toNumber()).toBe(-40);

    expect(manager.observe(ID, new Decimal(0))).toBe("FLAT");
  });

  it("only ever adds in the direction of a short position while scaling", () => {
    const quantities = [0, -90, -180, -270];
    const magnitudes = [-0.05, -0.08, -0.1, -0.13];
    const orders = quantities.map((quantity, index) => manager.step(context(quantity, magnitudes[index])).order);

    expect(orders.slice(0, 3).map((order) => order?.quantity.toNumber())).toEqual([-90, -90, -90]);
    expect(orders[3]).toBeNull();

    const exit = manager.step(context(-270, 0.02));
    expect(exit.reason).toBe("reversed");
    expect(exit.order?.quantity.toNumber()).toBe(270);
  });

  it("adopts an unexpected position as held", () => {
    const decision = manager.step(context(-30, -0.05));
    expect(decision).toMatchObject({ from: "HELD", to: "HELD", reason: "hold" });
    expect(manager.recordOf(ID).direction).toBe("SHORT");
  });

  it("reports every tracked state", () => {
    manager.step(context(0, 0.05));
    manager.observe("RTM50P", new Decimal(0));
    expect(manager.states()).toEqual(
      new Map([
        [ID, "OPENING"],
        ["RTM50P", "FLAT"]
      ])
    );
  });

  it("only applies a proposed transition once it is committed", () => {
    manager.step(context(0, 0.05));
    const proposal = manager.propose(context(90, 0.005));

    expect(proposal).toMatchObject({ from: "HELD", to: "UNWINDING", reason: "converged" });
    expect(manager.stateOf(ID)).toBe("HELD");
    expect(manager.commit(ID)).toBe("UNWINDING");
    expect(manager.stateOf(ID)).toBe("UNWINDING");
  });

  it("drops an uncommitted proposal on the next proposal", () => {
    manager.step(context(0, 0.05));
    manager.propose(context(90, 0.08));
    const retry = manager.propose(context(90, 0.08));

    expect(retry.reason).toBe("scale");
    expect(manager.recordOf(ID).scaleBase.toNumber()).toBe(0.05);
  });
});
