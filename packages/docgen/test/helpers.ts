import { Ok, type Result } from "@codebrief/core";
import { TreeSitterJavaProvider, buildProject, type ProjectModel } from "@codebrief/structure";

import type { AnnotationError, AnnotationGenerator, AnnotationRequest, AnnotationResponse } from "../src/index.js";

export type Behaviour = (
  request: AnnotationRequest,
  call: number
) => Result<AnnotationResponse, AnnotationError> | Promise<Result<AnnotationResponse, AnnotationError>>;

/** Indices the request asks to have described */
export function requestedIndices(request: AnnotationRequest): number[] {
  return Object.keys(request.mode === "cold" ? request.methods : request.dirty).map(Number);
}

/**
 * Describes the class and every requested method.
 */
export const describeAll: Behaviour = (request) =>
  Ok({
    id: request.id,
    description: `Describes ${request.id}.`,
    confidence: 90,
    methods: requestedIndices(request).map((index) => ({
      method_index: index,
      description: `Method ${index} of ${request.id}.`,
      confidence: 80,
    })),
  });

/**
 * In-process generator that records requests and how many run at once.
 */
export class FakeGenerator implements AnnotationGenerator {
  readonly requests: AnnotationRequest[] = [];
  private readonly calls = new Map<string, number>();
  private inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly behaviour: Behaviour = describeAll) {}

  async generate(request: AnnotationRequest): Promise<Result<AnnotationResponse, AnnotationError>> {
    this.requests.push(request);
    const call = (this.calls.get(request.id) ?? 0) + 1;
    this.calls.set(request.id, call);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return await this.behaviour(request, call);
    } finally {
      this.inFlight--;
    }
  }

  callsFor(id: string): number {
    return this.calls.get(id) ?? 0;
  }
}

const provider = new TreeSitterJavaProvider();

export function build(...units: Array<[string, string]>): ProjectModel {
  const result = buildProject(
    provider,
    units.map(([ufid, source]) => ({ ufid, source }))
  );
  if (!result.ok) throw new Error(result.error);
  return result.value;
}

export const CART = `package shop;

public class Cart {
    private int total;

    public void add(int price) {
        total = sum(total, price);
    }

    int sum(int a, int b) {
        return a + b;
    }

    static class Line {
        String label() { return "line"; }
    }
}
`;

export const BROKEN = `package shop;

class Broken {
    void fail() {}
}
`;
