import { describe, it, expect } from "vitest";
import { Err, Ok } from "@codebrief/core";
import type { ClassEntity, ProjectModel } from "@codebrief/structure";
import {
  DescriptionOrchestrator,
  terminalError,
  transientError,
  type OrchestratorOptions,
} from "../src/index.js";
import { BROKEN, CART, FakeGenerator, build, describeAll } from "./helpers.js";

const delays: number[] = [];

const options: OrchestratorOptions = {
  concurrency: 4,
  retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 },
  sleep: async (ms) => void delays.push(ms),
};

function classOf(project: ProjectModel, ucid: string): ClassEntity {
  const cls = project.registry.lookupClass(ucid);
  if (!cls) throw new Error(`missing ${ucid}`);
  return cls;
}

function descriptionOf(project: ProjectModel, umid: string): string | undefined {
  return project.registry.lookupByUmid(umid)?.description;
}

describe("DescriptionOrchestrator", () => {
  it("describes every class, nested ones included, and merges by index", async () => {
    const project = build(["shop/Cart.java", CART]);
    const generator = new FakeGenerator();

    const report = await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(report).toMatchObject({ scheduled: 2, generated: 2, failed: 0, skipped: 0 });
    expect(generator.requests.map((r) => r.id)).toEqual(["shop.Cart", "shop.Cart.Line"]);
    expect(descriptionOf(project, "shop.Cart#add(int)")).toBe("Method 0 of shop.Cart.");
    expect(descriptionOf(project, "shop.Cart#sum(int,int)")).toBe("Method 1 of shop.Cart.");
    expect(descriptionOf(project, "shop.Cart.Line#label()")).toBe("Method 0 of shop.Cart.Line.");
    expect(classOf(project, "shop.Cart")).toMatchObject({
      description: "Describes shop.Cart.",
      confidence: 90,
      annotationStatus: "generated",
    });
  });

  it("keeps one class's failure away from the others", async () => {
    const project = build(["shop/Cart.java", CART], ["shop/Broken.java", BROKEN]);
    const generator = new FakeGenerator((request, call) =>
      request.id === "shop.Broken" ? Err(terminalError("bad request", 400)) : describeAll(request, call)
    );

    const report = await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(report).toMatchObject({ scheduled: 3, generated: 2, failed: 1 });
    expect(report.outcomes.find((o) => o.ucid === "shop.Broken")).toEqual({
      ucid: "shop.Broken",
      status: "error",
      attempts: 1,
      described: 0,
      missing: 0,
      error: "bad request",
    });
    expect(classOf(project, "shop.Broken")).toMatchObject({
      description: "",
      annotationStatus: "error",
      annotationError: "bad request",
    });
    expect(descriptionOf(project, "shop.Broken#fail()")).toBe("");
    expect(descriptionOf(project, "shop.Cart#add(int)")).toBe("Method 0 of shop.Cart.");
    expect(descriptionOf(project, "shop.Cart.Line#label()")).toBe("Method 0 of shop.Cart.Line.");
  });

  it("contains a generator that throws", async () => {
    const project = build(["shop/Broken.java", BROKEN]);
    const generator = new FakeGenerator(() => {
      throw new Error("boom");
    });

    const report = await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(report.outcomes).toEqual([
      { ucid: "shop.Broken", status: "error", attempts: 1, described: 0, missing: 0, error: "boom" },
    ]);
  });

  it("retries transient failures for the same class", async () => {
    delays.length = 0;
    const project = build(["shop/Broken.java", BROKEN]);
    const generator = new FakeGenerator((request, call) =>
      call === 1 ? Err(transientError("overloaded", 503)) : describeAll(request, call)
    );

    const report = await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(report.outcomes[0]).toMatchObject({ status: "generated", attempts: 2 });
    expect(generator.callsFor("shop.Broken")).toBe(2);
    expect(delays).toEqual([100]);
    expect(descriptionOf(project, "shop.Broken#fail()")).toBe("Method 0 of shop.Broken.");
  });

  it("marks a class failed once retries run out", async () => {
    const project = build(["shop/Broken.java", BROKEN]);
    const generator = new FakeGenerator(() => Err(transientError("rate limited", 429)));

    const report = await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(report.outcomes[0]).toMatchObject({
      status: "error",
      attempts: 3,
      error: "Gave up after 3 attempts: rate limited",
    });
    expect(classOf(project, "shop.Broken").annotationStatus).toBe("error");
  });

  it("never exceeds the concurrency ceiling", async () => {
    const units: Array<[string, string]> = Array.from({ length: 8 }, (_, i) => [
      `C${i}.java`,
      `class C${i} {\n    void run() {}\n}\n`,
    ]);
    const project = build(...units);
    const generator = new FakeGenerator();

    const report = await new DescriptionOrchestrator(generator, { ...options, concurrency: 3 }).annotate(
      project.files
    );

    expect(report.generated).toBe(8);
    expect(generator.maxInFlight).toBe(3);
  });

  it("skips classes that are fully described", async () => {
    const project = build(["shop/Cart.java", CART]);
    const line = classOf(project, "shop.Cart.Line");
    line.description = "A line item.";
    for (const method of line.methods.values()) {
      method.description = "Labels the line.";
    }
    const generator = new FakeGenerator();

    const report = await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(report).toMatchObject({ scheduled: 1, skipped: 1 });
    expect(generator.requests.map((r) => r.id)).toEqual(["shop.Cart"]);
  });

  it("schedules a class once even when reachable twice", async () => {
    const project = build(["shop/Cart.java", CART]);
    const generator = new FakeGenerator();

    const report = await new DescriptionOrchestrator(generator, options).annotate([
      ...project.files,
      ...project.files,
    ]);

    expect(report.scheduled).toBe(2);
  });

  it("only writes methods it asked about in a warm request", async () => {
    const project = build(["shop/Cart.java", CART]);
    const sum = project.registry.lookupByUmid("shop.Cart#sum(int,int)");
    if (!sum) throw new Error("missing sum");
    sum.description = "Adds two numbers.";
    sum.confidence = 70;
    const generator = new FakeGenerator((request) =>
      Ok({
        id: request.id,
        description: "Keeps a running total.",
        confidence: 88,
        methods: [
          { method_index: 0, description: "Adds a price.", confidence: 95 },
          { method_index: 1, description: "Overwritten?", confidence: 10 },
        ],
      })
    );

    await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(generator.requests[0].mode).toBe("warm");
    expect(descriptionOf(project, "shop.Cart#add(int)")).toBe("Adds a price.");
    expect(sum.description).toBe("Adds two numbers.");
    expect(sum.confidence).toBe(70);
  });

  it("counts requested methods the response left out", async () => {
    const project = build(["shop/Cart.java", CART]);
    const generator = new FakeGenerator((request) =>
      Ok({ id: request.id, description: "Something.", confidence: 50, methods: [] })
    );

    const report = await new DescriptionOrchestrator(generator, options).annotate(project.files);

    expect(report.outcomes.find((o) => o.ucid === "shop.Cart")).toMatchObject({
      status: "generated",
      described: 0,
      missing: 2,
    });
    expect(descriptionOf(project, "shop.Cart#add(int)")).toBe("");
  });
});
