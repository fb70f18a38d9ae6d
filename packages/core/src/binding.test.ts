// Tests for the command binder

import { describe, it, expect, vi } from "vitest";
import { BindingTable, BoundCommand, bindCommands, compilePattern } from "./binding.ts";
import { cmd, mapIdentity, mapToString, prop } from "./commands.ts";
import { BindingError, DispatchError } from "./errors.ts";
import { defineTarget } from "./target.ts";

function catchError<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (e) {
    if (e instanceof type) return e;
    throw e;
  }
  throw new Error("expected an error to be thrown");
}

function speedDevice() {
  const state = { speed: 0 };
  const target = defineTarget({
    methods: {
      set_speed: (speed: number) => {
        state.speed = speed;
      },
      get_speed: () => state.speed,
    },
    properties: {
      speed: {
        get: () => state.speed,
        set: (value) => {
          state.speed = Number(value);
        },
      },
      serial: { get: () => "SN-1" },
    },
  });
  return { state, target };
}

describe("compilePattern", () => {
  it("counts capture groups, ignoring non-capturing groups", () => {
    expect(compilePattern("^S=([0-9]+)$").groups).toBe(1);
    expect(compilePattern(/^(a)(?:b)(?<c>c)$/).groups).toBe(2);
    expect(compilePattern(/^Q\?$/).groups).toBe(0);
  });

  it("uses source and flags as the key and drops stateful flags", () => {
    const compiled = compilePattern(/^a$/gi);
    expect(compiled.key).toBe("/^a$/i");
    expect(compiled.regex.global).toBe(false);
    expect(compilePattern("^S=([0-9]+)$").key).toBe("/^S=([0-9]+)$/");
  });

  it("gives string and RegExp forms of the same pattern the same key", () => {
    expect(compilePattern("^A$").key).toBe(compilePattern(/^A$/).key);
  });

  it("rejects an invalid pattern with a binding error", () => {
    const error = catchError(() => compilePattern("^S=([0-9]+$"), BindingError);
    expect(error.kind).toBe("invalidPattern");
    expect(error.message.startsWith("Invalid regular expression '^S=([0-9]+$': ")).toBe(true);

    expect(() => bindCommands([cmd(() => null, "(")], { primary: defineTarget({}) })).toThrow(
      BindingError,
    );
  });
});

describe("BoundCommand", () => {
  it("rejects argument mappings that do not match the group count", () => {
    const error = catchError(
      () => new BoundCommand(/^S=(\d+)$/, () => null, [Number, Number], mapToString(), undefined),
      BindingError,
    );
    expect(error.kind).toBe("argumentArity");
    expect(error.message).toBe("Expected 1 argument mapping(s) for /^S=(\\d+)$/, got 2");

    expect(() => new BoundCommand(/^S=(\d+)$/, () => null, [], mapToString(), undefined)).toThrow(
      BindingError,
    );
  });

  it("accepts omitted argument mappings for any group count", () => {
    const command = new BoundCommand(/^(a)(b)$/, (x, y) => `${x}${y}`, undefined, mapToString(), undefined);
    expect(command.process("ab")).toBe("ab");
  });

  it("requires a full match by default", () => {
    const command = new BoundCommand(/S=(\d+)/, (n) => n, [Number], mapToString(), undefined);
    expect(command.canProcess("S=10")).toBe(true);
    expect(command.canProcess("S=10garbage")).toBe(false);
    expect(command.canProcess("xS=10")).toBe(false);
  });

  it("requires a full match when the pattern has the multiline flag", () => {
    const command = new BoundCommand(/^S\?$/m, () => "1", undefined, mapToString(), undefined);
    expect(command.canProcess("S?")).toBe(true);
    expect(command.canProcess("S?\nXX")).toBe(false);
    expect(command.canProcess("XX\nS?")).toBe(false);
    expect(command.pattern.key).toBe("/^S\\?$/m");
  });

  it("anchors prefix mode at the start of the request under the multiline flag", () => {
    const command = new BoundCommand(/S\?/m, () => "1", undefined, mapToString(), undefined, "prefix");
    expect(command.canProcess("S?\nXX")).toBe(true);
    expect(command.canProcess("XX\nS?")).toBe(false);
  });

  it("accepts a matching prefix in prefix mode", () => {
    const command = new BoundCommand(/S=(\d+)/, (n) => n, [Number], mapToString(), undefined, "prefix");
    expect(command.canProcess("S=10garbage")).toBe(true);
    expect(command.canProcess("xS=10")).toBe(false);
    expect(command.process("S=10garbage")).toBe("10");
  });

  it("maps arguments before invoking and the result after", () => {
    const invoke = vi.fn((a: number, b: number) => a + b);
    const command = new BoundCommand(/^(\d+)\+(\d+)$/, invoke, [Number, Number], mapToString(), undefined);

    expect(command.process("2+3")).toBe("5");
    expect(invoke).toHaveBeenCalledWith(2, 3);
  });

  it("passes groups without a mapping as raw strings", () => {
    const command = new BoundCommand(/^(\w+)$/, (x) => x, undefined, mapIdentity(), undefined);
    expect(command.mapArguments(["12", "34"])).toEqual(["12", "34"]);
    expect(command.process("abc")).toBe("abc");
  });

  it("leaves non-participating groups undefined without mapping them", () => {
    const mapping = vi.fn((raw: string) => Number(raw));
    const command = new BoundCommand(/^A(\d)?$/, (x) => x, [mapping], mapIdentity(), undefined);
    expect(command.mapArguments([undefined])).toEqual([undefined]);
    expect(mapping).not.toHaveBeenCalled();
  });

  it("returns null for a member that returns nothing", () => {
    const command = new BoundCommand(/^RESET$/, () => undefined, undefined, mapToString(), undefined);
    expect(command.process("RESET")).toBeNull();
  });

  it("wraps invocation failures in a DispatchError", () => {
    const cause = new Error("boom");
    const command = new BoundCommand(
      /^X$/,
      () => {
        throw cause;
      },
      undefined,
      mapToString(),
      undefined,
    );

    const error = catchError(() => command.process("X"), DispatchError);
    expect(error.kind).toBe("invocation");
    expect(error.message).toBe("command /^X$/ failed: boom");
    expect(error.cause).toBe(cause);
  });

  it("treats a non-string result under identity mapping as an invocation failure", () => {
    const command = new BoundCommand(/^N$/, () => 42, undefined, mapIdentity(), undefined);
    expect(() => command.process("N")).toThrow(DispatchError);
  });
});

describe("bindCommands", () => {
  it("binds direct callables without looking them up", () => {
    const { target } = speedDevice();
    const fn = () => "pong";
    const table = bindCommands([cmd(fn, /^PING$/)], { primary: target });

    expect(table.size).toBe(1);
    expect(table.commands[0].process("PING")).toBe("pong");
  });

  it("resolves named members on the device", () => {
    const { state, target } = speedDevice();
    const table = bindCommands(
      [cmd("set_speed", /^S=([0-9]+)$/, { argumentMappings: [Number] }), cmd("get_speed", /^S\?$/)],
      { primary: target },
    );

    expect(table.find("S=10")?.process("S=10")).toBeNull();
    expect(state.speed).toBe(10);
    expect(table.find("S?")?.process("S?")).toBe("10");
  });

  it("consults the primary target before the fallback", () => {
    const { target: device } = speedDevice();
    const iface = defineTarget({ methods: { get_speed: () => "from interface" } });
    const table = bindCommands([cmd("get_speed", /^S\?$/)], { primary: iface, fallback: device });

    expect(table.commands[0].process("S?")).toBe("from interface");
  });

  it("falls back to the device when the interface lacks the member", () => {
    const { target: device } = speedDevice();
    const iface = defineTarget({});
    const table = bindCommands([cmd("get_speed", /^S\?$/)], { primary: iface, fallback: device });

    expect(table.commands[0].process("S?")).toBe("0");
  });

  it("fails for a member missing on both targets", () => {
    const { target } = speedDevice();
    expect(() => bindCommands([cmd("get_temp", /^T\?$/)], { primary: target })).toThrow(
      "Unable to produce callable object for non-existing member 'get_temp' of device or interface.",
    );
  });

  it("emits a getter and a setter for a property", () => {
    const { state, target } = speedDevice();
    const table = bindCommands(
      [prop("speed", { read: /^V\?$/, write: /^V=([0-9]+)$/, argumentMappings: [Number] })],
      { primary: target },
    );

    expect(table.commands.map((c) => c.pattern.key)).toEqual(["/^V\\?$/", "/^V=([0-9]+)$/"]);
    expect(table.find("V=7")?.process("V=7")).toBeNull();
    expect(state.speed).toBe(7);
    expect(table.find("V?")?.process("V?")).toBe("7");
  });

  it("binds only the getter when there is no write pattern", () => {
    const { target } = speedDevice();
    const table = bindCommands([prop("serial", { read: /^SN\?$/ })], { primary: target });

    expect(table.size).toBe(1);
    expect(table.commands[0].process("SN?")).toBe("SN-1");
  });

  it("rejects a write pattern on a read-only property", () => {
    const { target } = speedDevice();
    const error = catchError(
      () => bindCommands([prop("serial", { write: /^SN=(\w+)$/ })], { primary: target }),
      BindingError,
    );
    expect(error.kind).toBe("readOnlyProperty");
  });

  it("rejects a property command without patterns", () => {
    const { target } = speedDevice();
    const error = catchError(() => bindCommands([prop("speed", {})], { primary: target }), BindingError);
    expect(error.kind).toBe("emptyProperty");
  });

  it("rejects a write pattern without a capture group", () => {
    const { target } = speedDevice();
    const error = catchError(
      () => bindCommands([prop("speed", { write: /^V=$/ })], { primary: target }),
      BindingError,
    );
    expect(error.kind).toBe("argumentArity");
  });

  it("rejects the second command with an identical pattern", () => {
    const { target } = speedDevice();
    expect(() =>
      bindCommands([cmd("get_speed", "^S\\?$"), prop("speed", { read: /^S\?$/ })], {
        primary: target,
      }),
    ).toThrow("The regular expression /^S\\?$/ is associated with multiple commands.");
  });

  it("binds arity-checked specs only when mappings match the group count", () => {
    const { target } = speedDevice();
    expect(() =>
      bindCommands([cmd("set_speed", /^S=(\d+)$/, { argumentMappings: [] })], { primary: target }),
    ).toThrow(BindingError);
    expect(() =>
      bindCommands([cmd("set_speed", /^S=(\d+)$/, { argumentMappings: [Number] })], {
        primary: target,
      }),
    ).not.toThrow();
  });

  it("keeps declaration order so the first match wins", () => {
    const first = vi.fn(() => "first");
    const second = vi.fn(() => "second");
    const table = bindCommands([cmd(first, /^A.*$/), cmd(second, /^AB$/)], {
      primary: defineTarget({}),
    });

    expect(table.find("AB")?.process("AB")).toBe("first");
    expect(second).not.toHaveBeenCalled();
  });

  it("applies the match mode to every command", () => {
    const table = bindCommands([cmd(() => "ok", /^PING/)], { primary: defineTarget({}) }, {
      match: "prefix",
    });
    expect(table.find("PING now")).toBeDefined();

    const strict = bindCommands([cmd(() => "ok", /^PING/)], { primary: defineTarget({}) });
    expect(strict.find("PING now")).toBeUndefined();
  });

  it("returns a frozen table", () => {
    const table = bindCommands([cmd(() => "ok", /^PING$/)], { primary: defineTarget({}) });
    expect(table).toBeInstanceOf(BindingTable);
    expect(Object.isFrozen(table.commands)).toBe(true);
  });
});
