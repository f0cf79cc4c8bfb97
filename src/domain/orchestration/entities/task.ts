export type TaskContext = string | Record<string, unknown>;

export interface Task {
  readonly goal: string;
  readonly context?: TaskContext;
}

export function createTask(goal: string, context?: TaskContext): Task {
  const trimmed = goal.trim();
  if (!trimmed) {
    throw new Error("Task goal must not be empty");
  }
  return context === undefined
    ? Object.freeze({ goal: trimmed })
    : Object.freeze({ goal: trimmed, context });
}

export function describeTaskContext(task: Task): string | undefined {
  if (task.context === undefined) {
    return undefined;
  }
  return typeof task.context === "string"
    ? task.context
    : JSON.stringify(task.context, null, 2);
}
