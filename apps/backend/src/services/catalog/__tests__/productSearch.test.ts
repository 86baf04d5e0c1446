import { describe, it, expect } from "vitest";
import { searchProducts } from "../productSearch";

const named = (...names: string[]) => names.map((name) => ({ name }));

describe("searchProducts", () => {
  it("ranks prefix matches first, then shorter names", () => {
    const result = searchProducts(named("Milk 2L", "Almond Milk", "Milk"), "milk", 8);
    expect(result.map((v) => v.name)).toEqual(["Milk", "Milk 2L", "Almond Milk"]);
  });

  it("normalizes the query", () => {
    const result = searchProducts(named("Bread", "Milk"), "  MILK ", 8);
    expect(result.map((v) => v.name)).toEqual(["Milk"]);
  });

  it("keeps catalog order for equal ranks", () => {
    const result = searchProducts(named("Soy milk", "Oat milk", "Rice"), "milk", 8);
    expect(result.map((v) => v.name)).toEqual(["Soy milk", "Oat milk"]);
  });

  it("returns an unsorted prefix for an empty query", () => {
    const views = named("Zucchini", "Apple", "Milk");
    expect(searchProducts(views, "   ", 2)).toEqual([{ name: "Zucchini" }, { name: "Apple" }]);
  });

  it("truncates to the limit after ranking", () => {
    const result = searchProducts(named("Almond Milk", "Milk 2L", "Milk"), "milk", 2);
    expect(result.map((v) => v.name)).toEqual(["Milk", "Milk 2L"]);
  });

  it("measures name length in code points", () => {
    // "🍎🍎 milk" is 7 code points but 9 UTF-16 units; "abc milk" is 8 of both.
    const result = searchProducts(named("abc milk", "🍎🍎 milk"), "milk", 8);
    expect(result.map((v) => v.name)).toEqual(["🍎🍎 milk", "abc milk"]);
  });

  it("returns nothing when no name contains the query", () => {
    expect(searchProducts(named("Bread"), "milk", 8)).toEqual([]);
  });
});
