import { AceScorer } from "./aceScorer";
import { AudioEvaluator } from "./audioEvaluator";
import { UnsupportedKindError } from "./errors";
import { Evaluator } from "./evaluator";
import { McqEvaluator } from "./mcqEvaluator";
import { Task, TaskKind } from "./task";
import { TextEvaluator } from "./textEvaluator";
import { Transcriber } from "./transcriber";

/**
 * Explicit kind → evaluator registry. New kinds are added with
 * register(); existing evaluators are never touched.
 */
export class EvaluatorRouter {
  private readonly evaluators = new Map<TaskKind, Evaluator>();

  register(evaluator: Evaluator): this {
    this.evaluators.set(evaluator.kind, evaluator);
    return this;
  }

  route(task: Pick<Task, "kind">): Evaluator {
    const evaluator = this.evaluators.get(task.kind);
    if (!evaluator) {
      throw new UnsupportedKindError(task.kind);
    }
    return evaluator;
  }

  supports(kind: TaskKind): boolean {
    return this.evaluators.has(kind);
  }

  supportedKinds(): TaskKind[] {
    return [...this.evaluators.keys()].sort();
  }
}

export interface DefaultRouterDeps {
  scorer: AceScorer;
  transcriber: Transcriber;
}

export function createDefaultRouter(deps: DefaultRouterDeps): EvaluatorRouter {
  return new EvaluatorRouter()
    .register(new McqEvaluator())
    .register(new TextEvaluator(deps.scorer))
    .register(new AudioEvaluator(deps.scorer, deps.transcriber));
}
