import { describe, expect, it } from "vitest";
import { ConnectionError } from "./errors.ts";
import { MemoryBroker } from "./memory.ts";
import type { IncomingMessage } from "./transport.ts";

const body = (text: string) => new TextEncoder().encode(text);
const text = (message: IncomingMessage) => new TextDecoder().decode(message.body);
const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("MemoryBroker", () => {
  it("routes the default exchange by queue name", async () => {
    const broker = new MemoryBroker();
    broker.declareQueue("work");
    const seen: string[] = [];
    broker.subscribe("work", (m) => seen.push(text(m)));

    broker.publish("", "work", body("hello"), {});
    expect(seen).toEqual([]);
    await tick();

    expect(seen).toEqual(["hello"]);
  });

  it("routes named exchanges through bindings", async () => {
    const broker = new MemoryBroker();
    broker.declareExchange({ name: "wf", durable: false, autoDelete: false });
    broker.declareQueue("bound");
    broker.declareQueue("unbound");
    broker.bindQueue("bound", "wf", "engine");

    broker.publish("wf", "engine", body("x"), {});

    expect(broker.backlog("bound")).toBe(1);
    expect(broker.backlog("unbound")).toBe(0);
  });

  it("drops unroutable messages but records them", () => {
    const broker = new MemoryBroker();
    broker.publish("", "nowhere", body("x"), { correlationId: "c1" });
    expect(broker.published).toHaveLength(1);
    expect(broker.published[0].properties).toEqual({ correlationId: "c1" });
  });

  it("refuses an unknown exchange", () => {
    const broker = new MemoryBroker();
    expect(() => broker.publish("missing", "k", body("x"), {})).toThrow("no exchange missing");
  });

  it("refuses to redeclare an exchange with other parameters", () => {
    const broker = new MemoryBroker();
    broker.declareExchange({ name: "wf", durable: false, autoDelete: false });
    broker.declareExchange({ name: "wf", durable: false, autoDelete: false });
    expect(() => broker.declareExchange({ name: "wf", durable: true, autoDelete: false })).toThrow(
      "exchange wf redeclared with different parameters",
    );
  });

  it("delivers a backlog to the first consumer", async () => {
    const broker = new MemoryBroker();
    broker.declareQueue("work");
    broker.publish("", "work", body("a"), {});
    broker.publish("", "work", body("b"), {});

    const seen: string[] = [];
    broker.subscribe("work", (m) => seen.push(text(m)));
    await tick();

    expect(seen).toEqual(["a", "b"]);
    expect(broker.backlog("work")).toBe(0);
  });

  it("round-robins between consumers", async () => {
    const broker = new MemoryBroker();
    broker.declareQueue("work");
    const a: string[] = [];
    const b: string[] = [];
    broker.subscribe("work", (m) => a.push(text(m)));
    broker.subscribe("work", (m) => b.push(text(m)));

    for (const n of ["1", "2", "3", "4"]) broker.publish("", "work", body(n), {});
    await tick();

    expect(a).toEqual(["1", "3"]);
    expect(b).toEqual(["2", "4"]);
  });

  it("deletes an auto-delete queue when its last consumer leaves", () => {
    const broker = new MemoryBroker();
    broker.declareQueue("tmp", { autoDelete: true });
    const stop = broker.subscribe("tmp", () => {});

    stop();

    expect(broker.hasQueue("tmp")).toBe(false);
  });
});

describe("MemoryConnection", () => {
  it("keeps exclusive queues to their owner", async () => {
    const broker = new MemoryBroker();
    const owner = broker.connect();
    const other = broker.connect();

    await owner.declareReplyQueue("mine", "");
    await owner.declareReplyQueue("mine", "");

    await expect(other.declareReplyQueue("mine", "")).rejects.toThrow(
      "queue mine is exclusive to another connection",
    );
  });

  it("binds reply queues only on named exchanges", async () => {
    const broker = new MemoryBroker();
    const conn = broker.connect();
    await conn.declareExchange({ name: "wf", durable: false, autoDelete: false });
    await conn.declareReplyQueue("r1", "wf");

    broker.publish("wf", "r1", body("x"), {});

    expect(broker.backlog("r1")).toBe(1);
  });

  it("publishes through producers", async () => {
    const broker = new MemoryBroker();
    const conn = broker.connect();
    broker.declareQueue("work");

    const producer = await conn.openProducer();
    await producer.publish("", "work", body("x"), { persistent: true });

    expect(conn.producersOpened).toBe(1);
    expect(broker.backlog("work")).toBe(1);

    await producer.close();
    await expect(producer.publish("", "work", body("y"), {})).rejects.toThrow("producer closed");
  });

  it("cancels consumers and drops owned queues on close", async () => {
    const broker = new MemoryBroker();
    const conn = broker.connect();
    await conn.declareReplyQueue("r1", "");
    broker.declareQueue("shared");
    const seen: string[] = [];
    await conn.consume("shared", (m) => seen.push(text(m)));

    await conn.close();
    broker.publish("", "shared", body("late"), {});
    await tick();

    expect(broker.hasQueue("r1")).toBe(false);
    expect(seen).toEqual([]);
    expect(broker.backlog("shared")).toBe(1);
  });

  it("fails every operation once closed", async () => {
    const broker = new MemoryBroker();
    const conn = broker.connect();
    await conn.close();

    const error = await conn.openProducer().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ kind: "closed" });
    await expect(conn.declareReplyQueue("r", "")).rejects.toBeInstanceOf(ConnectionError);
  });
});
