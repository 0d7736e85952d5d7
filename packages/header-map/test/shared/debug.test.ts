/**
 * Unit tests for Debug Channels.
 *
 * - Channel enable/disable via HEADER_MAP_DEBUG
 * - Pretty and JSON formatting
 * - Resolver decisions reaching the resolve channel
 */
import { describe, test, expect, beforeEach, afterEach } from "vitest";

import { createTypeIdentifier } from "../../src/model/identity.js";
import { createHeaderPathResolver } from "../../src/resolver/header-path-resolver.js";
import {
  configureDebug,
  debug,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
} from "../../src/shared/debug.js";

function captureOutput(): string[] {
  const messages: string[] = [];
  configureDebug({ output: (msg) => messages.push(msg) });
  return messages;
}

function setDebugEnv(value: string | undefined): void {
  if (value === undefined) {
    delete process.env["HEADER_MAP_DEBUG"];
  } else {
    process.env["HEADER_MAP_DEBUG"] = value;
  }
  refreshDebugChannels();
}

describe("debug channels", () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env["HEADER_MAP_DEBUG"];
  });

  afterEach(() => {
    setDebugEnv(originalEnv);
    configureDebug({ format: "pretty", timestamps: false, output: console.log });
  });

  test("disabled without the environment variable", () => {
    setDebugEnv(undefined);
    expect(isDebugEnabled()).toBe(false);
    expect(isDebugEnabled("resolve")).toBe(false);
  });

  test("wildcard enables every channel", () => {
    setDebugEnv("*");
    expect(isDebugEnabled("load")).toBe(true);
    expect(isDebugEnabled("anything")).toBe(true);
  });

  test("comma list enables only the named channels", () => {
    setDebugEnv("load, WRITE");
    expect(isDebugEnabled("load")).toBe(true);
    expect(isDebugEnabled("write")).toBe(true);
    expect(isDebugEnabled("resolve")).toBe(false);
  });

  test("resolver decisions are logged in pretty format", () => {
    setDebugEnv("resolve");
    const messages = captureOutput();

    createHeaderPathResolver({ pathSeparator: "/" }).resolveHeaderPath(createTypeIdentifier("com.example.app.Widget"));

    expect(messages).toEqual([
      '[resolve.header.computed] { type="com.example.app.Widget", header="com/example/app/Widget.h" }',
    ]);
  });

  test("json format emits one object per message", () => {
    setDebugEnv("load");
    const messages = captureOutput();
    configureDebug({ format: "json" });

    debug.load("resource.merged", { resource: "a.properties" });

    expect(messages).toEqual(['{"channel":"load","point":"resource.merged","data":{"resource":"a.properties"}}']);
  });

  test("disabled channels produce no output", () => {
    setDebugEnv("write");
    const messages = captureOutput();

    debug.resolve("header.computed", { header: "x.h" });
    getDebugChannel("custom")("point");

    expect(messages).toEqual([]);
  });
});
