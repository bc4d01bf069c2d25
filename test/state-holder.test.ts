import pino from "pino";
import { expect, test, vi } from "vitest";
import { parseState } from "../src/state/state";
import { StateHolder } from "../src/state/state-holder";

const silent = pino({ level: "silent" });

test("starts in NORMAL unless told otherwise", () => {
  expect(new StateHolder(undefined, silent).currentState()).toBe("NORMAL");
  expect(new StateHolder("RECOVERY", silent).currentState()).toBe("RECOVERY");
});

test("notifies listeners only when the state changes", () => {
  const holder = new StateHolder("NORMAL", silent);
  const listener = vi.fn();
  holder.subscribe(listener);

  holder.setState("NORMAL");
  holder.setState("DEGRADED");
  holder.setState("DEGRADED");
  holder.setState("FAILOVER");

  expect(listener.mock.calls).toEqual([
    ["DEGRADED", "NORMAL"],
    ["FAILOVER", "DEGRADED"]
  ]);
  expect(holder.currentState()).toBe("FAILOVER");
});

test("unsubscribed listeners stop receiving changes", () => {
  const holder = new StateHolder("NORMAL", silent);
  const listener = vi.fn();
  const unsubscribe = holder.subscribe(listener);

  holder.setState("DEGRADED");
  unsubscribe();
  holder.setState("RECOVERY");

  expect(listener).toHaveBeenCalledTimes(1);
});

test("a failing listener does not block the others or the change", () => {
  const logger = pino({ level: "silent" });
  const errorSpy = vi.spyOn(logger, "error");
  const holder = new StateHolder("NORMAL", logger);
  const after = vi.fn();

  holder.subscribe(() => {
    throw new Error("listener exploded");
  });
  holder.subscribe(after);
  holder.setState("FAILOVER");

  expect(holder.currentState()).toBe("FAILOVER");
  expect(after).toHaveBeenCalledWith("FAILOVER", "NORMAL");
  expect(errorSpy).toHaveBeenCalledTimes(1);
});

test("parseState accepts any casing and rejects unknown names", () => {
  expect(parseState(" degraded ")).toBe("DEGRADED");
  expect(parseState("Failover")).toBe("FAILOVER");
  expect(parseState("OFFLINE")).toBeNull();
  expect(parseState("")).toBeNull();
});
