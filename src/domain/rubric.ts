import { AceDimension, ACE_DIMENSIONS } from "./task";

export type DimensionWeights = Partial<Record<AceDimension, number>>;

export interface RubricEntry {
  rubricRef: string;
  // Declared dimensions and their weight. Undeclared = not applicable.
  weights: DimensionWeights;
}

export interface RubricTableData {
  shared?: Record<string, DimensionWeights>;
  assignments?: Record<string, Record<string, DimensionWeights>>;
}

/**
 * Rubric weight table keyed by (assignment, rubricRef, dimension).
 * Assignment-specific entries win over shared ones.
 */
export class RubricWeightTable {
  private readonly shared: Map<string, DimensionWeights>;
  private readonly byAssignment: Map<string, Map<string, DimensionWeights>>;

  constructor(data: RubricTableData = {}) {
    this.shared = new Map(Object.entries(data.shared ?? {}).map(([ref, w]) => [ref, checkWeights(ref, w)]));
    this.byAssignment = new Map(
      Object.entries(data.assignments ?? {}).map(([assignmentId, refs]) => [
        assignmentId,
        new Map(Object.entries(refs).map(([ref, w]) => [ref, checkWeights(`${assignmentId}/${ref}`, w)])),
      ])
    );
  }

  resolve(assignmentId: string, rubricRef: string): RubricEntry | null {
    const weights = this.byAssignment.get(assignmentId)?.get(rubricRef) ?? this.shared.get(rubricRef);
    if (!weights) {
      return null;
    }
    return { rubricRef, weights };
  }

  weightFor(assignmentId: string, rubricRef: string, dimension: AceDimension): number | undefined {
    return this.resolve(assignmentId, rubricRef)?.weights[dimension];
  }
}

export function declaredDimensions(entry: RubricEntry): AceDimension[] {
  return ACE_DIMENSIONS.filter((d) => entry.weights[d] !== undefined);
}

function checkWeights(label: string, weights: DimensionWeights): DimensionWeights {
  const out: DimensionWeights = {};
  for (const dimension of ACE_DIMENSIONS) {
    const w = weights[dimension];
    if (w === undefined) continue;
    if (!Number.isFinite(w) || w <= 0) {
      throw new Error(`Rubric ${label}: weight for ${dimension} must be a positive number, got ${w}`);
    }
    out[dimension] = w;
  }
  if (Object.keys(out).length === 0) {
    throw new Error(`Rubric ${label}: declares no ACE dimension`);
  }
  return Object.freeze(out);
}
