import { Schemas, SchemaValidationCache } from "../schemas";
import { DetailedValidationError, UnknownTaskTypeError } from "../errors";
import { validateDetailed } from "../validation";
import { BUILT_IN_PROFILES, SimulatedTask } from "../task/task_variants";
import type { Task } from "../task/task";
import type { TaskDependencies, TaskDescription } from "../task/task.types";
import type { TaskVariantProfile } from "../task/task_variants";

/**
 * Builds the task for one discriminant.
 */
export type TaskConstructor = (taskId: number, name: string, dependencies: TaskDependencies) => Task;

/**
 * Explicit discriminant → constructor mapping.
 */
export type TaskRegistry = ReadonlyMap<string, TaskConstructor>;

/**
 * A description the factory refused while building a batch.
 */
export type RejectedDescription = {
  index: number;
  error: UnknownTaskTypeError;
};

export type CreateTasksResult = {
  tasks: Task[];
  rejected: RejectedDescription[];
};

export type CreateTasksOptions = {
  /** Collect unknown-type descriptions in `rejected` instead of throwing */
  skipUnknown?: boolean;
};

/**
 * Type guard for the shape every description must have.
 */
export function isTaskDescription(data: unknown): data is TaskDescription {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema(Schemas.TaskDescription);
  return validateSchema(data);
}

/**
 * Registry of the built-in `email`, `backup` and `report` types.
 */
export function createDefaultTaskRegistry(
  profiles: readonly TaskVariantProfile[] = BUILT_IN_PROFILES
): TaskRegistry {
  return new Map<string, TaskConstructor>(
    profiles.map((profile) => [
      profile.type,
      (taskId, name, dependencies) => new SimulatedTask(taskId, name, profile, dependencies),
    ])
  );
}

/**
 * Turns untyped description records into tasks.
 *
 * Only the record shape and the discriminant are checked; id uniqueness and
 * empty names are the caller's business.
 *
 * @example
 * const factory = new TaskFactory({ dependencies: { timeUnitMs: 10 } });
 * const task = factory.createTask({ taskId: 1, name: 'Welcome mail', type: 'email' });
 */
export class TaskFactory {
  private readonly registry: TaskRegistry;
  private readonly dependencies: TaskDependencies;

  constructor(options: { registry?: TaskRegistry; dependencies?: TaskDependencies } = {}) {
    this.registry = options.registry ?? createDefaultTaskRegistry();
    this.dependencies = options.dependencies ?? {};
  }

  /**
   * @throws DetailedValidationError if the record lacks an integer `taskId`,
   * a string `name` or a string `type`
   * @throws UnknownTaskTypeError if `type` is not registered
   */
  createTask(description: unknown): Task {
    if (!isTaskDescription(description)) {
      const { errors } = validateDetailed(Schemas.TaskDescription, description);
      throw new DetailedValidationError('TaskDescription', errors);
    }

    const construct = this.registry.get(description.type);
    if (!construct) {
      throw new UnknownTaskTypeError(description.type);
    }

    return construct(description.taskId, description.name, this.dependencies);
  }

  /**
   * Builds every description in order. Validation errors always throw.
   */
  createTasks(descriptions: readonly unknown[], options: CreateTasksOptions = {}): CreateTasksResult {
    const tasks: Task[] = [];
    const rejected: RejectedDescription[] = [];

    descriptions.forEach((description, index) => {
      try {
        tasks.push(this.createTask(description));
      } catch (error) {
        if (options.skipUnknown && error instanceof UnknownTaskTypeError) {
          rejected.push({ index, error });
          return;
        }
        throw error;
      }
    });

    return { tasks, rejected };
  }

  getRegisteredTypes(): string[] {
    return Array.from(this.registry.keys());
  }
}
