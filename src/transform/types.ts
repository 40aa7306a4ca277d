export type TaskType = "summarization" | "classification_status" | "classification_priority" | "qa";

export interface ExampleMetadata {
  issue_key: string;
  project: string;
  status: string;
  priority: string;
}

/** One JSONL line of the training set. Keys are the on-disk format. */
export interface TrainingExample {
  instruction: string;
  input: string;
  output: string;
  task_type: TaskType;
  metadata: ExampleMetadata;
}
