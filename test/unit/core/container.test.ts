/**
 * Unit tests for Container (Dependency Injection)
 * Tests singleton/transient lifetimes, and error handling
 */

import { beforeEach, describe, expect, test } from "vitest";
import { Container } from "../../../src/core/container";

class TestService {
  constructor(private value: string) {}

  getValue(): string {
    return this.value;
  }
}

class DependentService {
  constructor(private service: TestService) {}

  getValue(): string {
    return `Dependent: ${this.service.getValue()}`;
  }
}

interface TestServices {
  base: TestService;
  dependent: DependentService;
  counter: TestService;
  label: string;
  a: { value: unknown };
  b: { value: unknown };
}

describe("Container", () => {
  let container: Container<TestServices>;

  beforeEach(() => {
    container = new Container<TestServices>();
  });

  test("singletons are created once, lazily", () => {
    let created = 0;
    container.singleton("base", () => new TestService(`instance-${++created}`));

    expect(created).toBe(0);
    expect(container.get("base")).toBe(container.get("base"));
    expect(created).toBe(1);
  });

  test("transient bindings create a new instance per get", () => {
    let created = 0;
    container.bind("counter", () => new TestService(`instance-${++created}`));

    expect(container.get("counter").getValue()).toBe("instance-1");
    expect(container.get("counter").getValue()).toBe("instance-2");
  });

  test("factories resolve their dependencies through the container", () => {
    container.singleton("base", () => new TestService("base"));
    container.bind("dependent", (c) => new DependentService(c.get("base")));

    expect(container.get("dependent").getValue()).toBe("Dependent: base");
  });

  test("throws for unregistered services", () => {
    expect(() => container.get("label")).toThrow("No binding found for 'label'");
  });

  test("detects circular dependencies", () => {
    container.singleton("a", (c) => ({ value: c.get("b") }));
    container.singleton("b", (c) => ({ value: c.get("a") }));

    expect(() => container.get("a")).toThrow("Circular dependency detected: a -> b -> a");
  });

  test("does not cache a singleton whose factory threw", () => {
    let fail = true;
    container.singleton("label", () => {
      if (fail) throw new Error("Factory error");
      return "ok";
    });

    expect(() => container.get("label")).toThrow("Factory error");
    fail = false;
    expect(container.get("label")).toBe("ok");
  });

  test("unbind, has and reset manage registrations", () => {
    container.singleton("base", () => new TestService("base"));
    container.bind("label", () => "label");

    expect(container.has("base")).toBe(true);
    expect(container.getRegisteredServices()).toEqual(["base", "label"]);

    container.unbind("base");
    expect(container.has("base")).toBe(false);

    container.reset();
    expect(container.getRegisteredServices()).toEqual([]);
  });
});
