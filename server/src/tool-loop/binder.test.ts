/**
 * Argument Binder Tests
 *
 * Covers: splitting and unquoting, type coercion, defaults, the
 * `key: value` form, and each binding error.
 */

import { describe, it, expect } from "vitest";
import { bindArguments, resolveInvocation, splitTopLevel, unquote } from "./binder.js";
import { ToolRegistry } from "../tools/registry.js";
import type { ToolDefinition } from "../tools/types.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

const forecast: ToolDefinition = {
  name: "weather.get_forecast",
  description: "Get the weather forecast for a location",
  parameters: {
    location: { type: "string", required: true },
    days: { type: "integer", default: 1 },
    metric: { type: "boolean" },
    ratio: { type: "number" },
  },
  execute: () => "sunny",
};

describe("splitTopLevel", () => {
  it("ignores separators inside quotes and parentheses", () => {
    expect(splitTopLevel('a=1, b="x,y", c=(1,2)')).toEqual(["a=1", ' b="x,y"', " c=(1,2)"]);
  });
});

describe("unquote", () => {
  it("strips matching quotes and resolves escapes", () => {
    expect(unquote("'O\\'Hare'")).toEqual({ text: "O'Hare", quoted: true });
    expect(unquote('"New York"')).toEqual({ text: "New York", quoted: true });
  });

  it("leaves unquoted and mismatched values alone", () => {
    expect(unquote("Paris")).toEqual({ text: "Paris", quoted: false });
    expect(unquote("'Paris\"")).toEqual({ text: "'Paris\"", quoted: false });
  });
});

describe("bindArguments", () => {
  // ============================================
  // HAPPY PATH
  // ============================================

  it("binds a quoted string and applies defaults", () => {
    expect(bindArguments(forecast, "location='New York'")).toEqual({ location: "New York", days: 1 });
  });

  it("coerces each declared type", () => {
    expect(bindArguments(forecast, 'location="Paris", days=3, metric=TRUE, ratio=0.5')).toEqual({
      location: "Paris",
      days: 3,
      metric: true,
      ratio: 0.5,
    });
  });

  it("accepts the key: value form", () => {
    expect(bindArguments(forecast, "location: Berlin, metric: false")).toEqual({
      location: "Berlin",
      days: 1,
      metric: false,
    });
  });

  it("keeps commas and parentheses inside quoted values", () => {
    expect(bindArguments(forecast, 'location="Washington, D.C. (USA)"').location).toBe("Washington, D.C. (USA)");
  });

  it("splits on the first equals sign only", () => {
    expect(bindArguments(forecast, "location=a=b").location).toBe("a=b");
  });

  it("ignores empty segments", () => {
    expect(bindArguments(forecast, "location=Rome, ,")).toEqual({ location: "Rome", days: 1 });
  });

  it("binds nothing for a tool without parameters", () => {
    const now: ToolDefinition = { name: "clock.now", description: "Time", parameters: {}, execute: () => "" };
    expect(bindArguments(now, "  ")).toEqual({});
  });

  // ============================================
  // ERRORS
  // ============================================

  it("rejects an unknown parameter before checking required ones", () => {
    expect(thrown(() => bindArguments(forecast, "city=Rome"))).toMatchObject({
      kind: "unknown_parameter",
      toolName: "weather.get_forecast",
      parameter: "city",
    });
  });

  it("reports a missing required parameter", () => {
    expect(() => bindArguments(forecast, "days=2")).toThrow(
      'Tool "weather.get_forecast" requires parameter "location"',
    );
  });

  it.each([
    ["ratio=abc", "ratio", "number", "abc"],
    ["ratio=0x10", "ratio", "number", "0x10"],
    ["days=2.5", "days", "integer", "2.5"],
    ["metric=yes", "metric", "boolean", "yes"],
  ])("reports a type mismatch for %s", (raw, parameter, expected, received) => {
    expect(thrown(() => bindArguments(forecast, `location=Rome, ${raw}`))).toMatchObject({
      kind: "type_mismatch",
      parameter,
      expected,
      received,
    });
  });

  it("rejects a pair without a separator", () => {
    expect(() => bindArguments(forecast, "Rome")).toThrow(
      'Invalid arguments for tool "weather.get_forecast": expected key=value, got "Rome"',
    );
  });

  it("rejects an empty key", () => {
    expect(() => bindArguments(forecast, "=Rome")).toThrow(
      'Invalid arguments for tool "weather.get_forecast": missing parameter name in "=Rome"',
    );
  });

  it("rejects a parameter given twice", () => {
    expect(() => bindArguments(forecast, "location=A, location=B")).toThrow(
      'Invalid arguments for tool "weather.get_forecast": parameter "location" given more than once',
    );
  });
});

describe("resolveInvocation", () => {
  const registry = new ToolRegistry();
  registry.register(forecast);

  it("returns the tool and its bound arguments", () => {
    const { tool, args } = resolveInvocation(registry.snapshot(), {
      toolName: "weather.get_forecast",
      rawParameters: "location='New York'",
    });

    expect(tool.name).toBe("weather.get_forecast");
    expect(args).toEqual({ location: "New York", days: 1 });
  });

  it("reports an unknown tool before looking at the arguments", () => {
    const error = thrown(() => resolveInvocation(registry.snapshot(), { toolName: "stocks.quote", rawParameters: "((" }));
    expect(error).toMatchObject({ kind: "unknown_tool", toolName: "stocks.quote" });
  });
});
