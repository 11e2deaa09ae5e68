import { describe, it, expect } from "vitest";
import { ScopeStore } from "../src/services/scopeStore";

describe("ScopeStore", () => {
  it("returns undefined for a request with no bindings", () => {
    const store = new ScopeStore();
    expect(store.get({}, "_token")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("binds and reads back per key", () => {
    const store = new ScopeStore();
    const req = {};
    store.bind(req, "_token", "abc");
    store.bind(req, "user", 42);
    expect(store.get(req, "_token")).toBe("abc");
    expect(store.get(req, "user")).toBe(42);
    expect(store.get(req, "missing")).toBeUndefined();
    expect(store.size).toBe(1);
  });

  it("overwrites an existing key", () => {
    const store = new ScopeStore();
    const req = {};
    store.bind(req, "_token", "first");
    store.bind(req, "_token", "second");
    expect(store.get(req, "_token")).toBe("second");
  });

  it("keys by identity, not by content", () => {
    const store = new ScopeStore();
    const a = { url: "/same" };
    const b = { url: "/same" };
    store.bind(a, "_token", "token-a");
    store.bind(b, "_token", "token-b");
    expect(store.get(a, "_token")).toBe("token-a");
    expect(store.get(b, "_token")).toBe("token-b");
    expect(store.size).toBe(2);
  });

  it("release drops every binding of one request only", () => {
    const store = new ScopeStore();
    const a = {};
    const b = {};
    store.bind(a, "_token", "token-a");
    store.bind(a, "extra", true);
    store.bind(b, "_token", "token-b");

    store.release(a);

    expect(store.has(a)).toBe(false);
    expect(store.get(a, "_token")).toBeUndefined();
    expect(store.get(a, "extra")).toBeUndefined();
    expect(store.get(b, "_token")).toBe("token-b");
    expect(store.size).toBe(1);
  });

  it("keeps interleaved async flows isolated", async () => {
    const store = new ScopeStore();
    const flow = async (name: string, delayMs: number) => {
      const req = {};
      store.bind(req, "_token", name);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      const seen = store.get(req, "_token");
      store.release(req);
      return seen;
    };

    const seen = await Promise.all([flow("one", 15), flow("two", 5), flow("three", 10)]);

    expect(seen).toEqual(["one", "two", "three"]);
    expect(store.size).toBe(0);
  });
});
