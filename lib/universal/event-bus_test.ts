import assert from "node:assert/strict";
import { test } from "node:test";
import { eventBus } from "./event-bus.ts";

type Events = {
  ready: void;
  warning: { message: string };
};

test("eventBus - typed delivery", async (t) => {
  await t.test("on/emit delivers detail synchronously", () => {
    const bus = eventBus<Events>();
    const seen: string[] = [];
    bus.on("warning", ({ message }) => {
      seen.push(message);
    });
    bus.emit("warning", { message: "careful" });
    assert.deepEqual(seen, ["careful"]);
  });

  await t.test("void events take no argument", () => {
    const bus = eventBus<Events>();
    let count = 0;
    bus.on("ready", () => {
      count++;
    });
    bus.emit("ready");
    bus.emit("ready");
    assert.equal(count, 2);
  });

  await t.test("off and the returned unsubscribe both detach", () => {
    const bus = eventBus<Events>();
    let count = 0;
    const listener = () => {
      count++;
    };
    const off = bus.on("ready", listener);
    off();
    bus.emit("ready");
    bus.on("ready", listener);
    bus.off("ready", listener);
    bus.emit("ready");
    assert.equal(count, 0);
  });
});

test("eventBus - observation", async (t) => {
  await t.test("isObserved follows per-event listeners", () => {
    const bus = eventBus<Events>();
    assert.equal(bus.isObserved("warning"), false);
    const off = bus.on("warning", () => {});
    assert.equal(bus.isObserved("warning"), true);
    assert.equal(bus.isObserved("ready"), false);
    off();
    assert.equal(bus.isObserved("warning"), false);
  });

  await t.test("a listener registered twice is counted once", () => {
    const bus = eventBus<Events>();
    let count = 0;
    const listener = () => {
      count++;
    };
    bus.on("ready", listener);
    bus.on("ready", listener);
    assert.equal(bus.listenerCount("ready"), 1);
    bus.emit("ready");
    assert.equal(count, 1);
  });
});
