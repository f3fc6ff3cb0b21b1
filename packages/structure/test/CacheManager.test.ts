import { describe, it, expect } from "vitest";
import {
  CacheManager,
  TreeSitterJavaProvider,
  buildProject,
  computeBodyHash,
  type ProjectModel,
} from "../src/index.js";
import { unit } from "./helpers.js";

const provider = new TreeSitterJavaProvider();

const ORIGINAL = `class Adder {
    int add(int a, int b) {
        return a + b;
    }

    int twice(int a) {
        return add(a, a);
    }
}
`;

const REFORMATTED = `class Adder {
    int add(int a, int b) { return a+b; }

    int twice(int a) {
        return add(a,
                   a);
    }
}
`;

const EDITED = `class Adder {
    int add(int a, int b) {
        return a - b;
    }

    int twice(int a) {
        return add(a, a);
    }
}
`;

function build(source: string): ProjectModel {
  const result = buildProject(provider, [unit("Adder.java", source)]);
  if (!result.ok) throw new Error(result.error);
  return result.value;
}

function describeAll(project: ProjectModel): void {
  for (const method of project.registry.methods()) {
    method.description = `Describes ${method.identifier}.`;
    method.confidence = 80;
  }
  for (const cls of project.registry.classes()) {
    cls.description = "Adds numbers.";
    cls.confidence = 90;
  }
}

describe("CacheManager", () => {
  describe("computeBodyHash", () => {
    it("ignores whitespace", () => {
      expect(computeBodyHash("{ return a + b; }")).toBe(computeBodyHash("{\n    return a+b;\n}"));
    });

    it("changes with the code", () => {
      expect(computeBodyHash("{ return a + b; }")).not.toBe(computeBodyHash("{ return a - b; }"));
    });

    it("is a sha-256 hex digest", () => {
      expect(computeBodyHash("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
    });
  });

  it("exports described methods and classes keyed by id", () => {
    const project = build(ORIGINAL);
    describeAll(project);

    const cache = new CacheManager(project.registry).export();

    expect(Object.keys(cache).sort()).toEqual(["Adder", "Adder#add(int,int)", "Adder#twice(int)"]);
    expect(cache["Adder#add(int,int)"]).toEqual({
      hash: project.registry.lookupByUmid("Adder#add(int,int)")?.bodyHash,
      description: "Describes add.",
      confidence: 80,
    });
  });

  it("leaves undescribed entities out of the export", () => {
    const project = build(ORIGINAL);

    expect(new CacheManager(project.registry).export()).toEqual({});
  });

  it("reuses descriptions when only whitespace changed", () => {
    const first = build(ORIGINAL);
    describeAll(first);
    const cache = new CacheManager(first.registry).export();

    const second = build(REFORMATTED);
    const manager = new CacheManager(second.registry);
    const stats = manager.load(cache);

    expect(stats).toEqual({ cleanMethods: 2, dirtyMethods: 0, cleanClasses: 1, dirtyClasses: 0 });
    expect(second.registry.lookupByUmid("Adder#add(int,int)")?.description).toBe("Describes add.");
    expect(manager.partition().dirty).toEqual([]);
  });

  it("clears the description of a method whose body changed", () => {
    const first = build(ORIGINAL);
    describeAll(first);
    const cache = new CacheManager(first.registry).export();

    const second = build(EDITED);
    const manager = new CacheManager(second.registry);
    manager.load(cache);

    const add = second.registry.lookupByUmid("Adder#add(int,int)");
    const twice = second.registry.lookupByUmid("Adder#twice(int)");
    expect(add?.description).toBe("");
    expect(add?.confidence).toBe(0);
    expect(twice?.description).toBe("Describes twice.");
    expect(manager.partition().dirty.map((m) => m.umid)).toEqual(["Adder#add(int,int)"]);
  });

  it("marks classes cached or pending by their own body hash", () => {
    const first = build(ORIGINAL);
    describeAll(first);
    const cache = new CacheManager(first.registry).export();

    const same = build(ORIGINAL);
    new CacheManager(same.registry).load(cache);
    const edited = build(EDITED);
    new CacheManager(edited.registry).load(cache);

    expect(same.registry.lookupClass("Adder")?.annotationStatus).toBe("cached");
    expect(same.registry.lookupClass("Adder")?.description).toBe("Adds numbers.");
    expect(edited.registry.lookupClass("Adder")?.annotationStatus).toBe("pending");
    expect(edited.registry.lookupClass("Adder")?.description).toBe("");
  });
});
