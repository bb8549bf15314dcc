import { describe, it, expect } from "vitest";
import { LineChannel, END_OF_STREAM } from "../src/core/LineChannel.js";

describe("LineChannel", () => {
  it("returns complete lines and holds the partial one", async () => {
    const channel = new LineChannel();

    channel.push("first\nsec");
    expect(await channel.next()).toEqual(["first"]);

    channel.push("ond\nthird\n");
    expect(await channel.next()).toEqual(["second", "third"]);
  });

  it("strips carriage returns", async () => {
    const channel = new LineChannel();

    channel.push("one\r\ntwo\r\n");

    expect(await channel.next()).toEqual(["one", "two"]);
  });

  it("waits until a line is complete", async () => {
    const channel = new LineChannel();
    const pending = channel.next();

    channel.push("no newline yet");
    channel.push(" still\n");

    expect(await pending).toEqual(["no newline yet still"]);
  });

  it("flushes the partial line on end, then reports end of stream", async () => {
    const channel = new LineChannel();

    channel.push("done\ntail");
    channel.end();

    expect(await channel.next()).toEqual(["done", "tail"]);
    expect(await channel.next()).toBe(END_OF_STREAM);
    expect(await channel.next()).toBe(END_OF_STREAM);
  });

  it("wakes a waiting reader on end", async () => {
    const channel = new LineChannel();
    const pending = channel.next();

    channel.end();

    expect(await pending).toBe(END_OF_STREAM);
    expect(channel.isEnded).toBe(true);
  });

  it("keeps empty lines", async () => {
    const channel = new LineChannel();

    channel.push("a\n\nb\n");

    expect(await channel.next()).toEqual(["a", "", "b"]);
  });

  it("ignores pushes after end", async () => {
    const channel = new LineChannel();
    channel.end();

    channel.push("late\n");

    expect(await channel.next()).toBe(END_OF_STREAM);
  });
});
