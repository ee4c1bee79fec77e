export type TaskStatus = "pending" | "running" | "done" | "failed";

export const TASK_STATUSES: readonly TaskStatus[] = ["pending", "running", "done", "failed"];

export type Task = {
  id: number;
  chatId: number;
  userId: number;
  username: string;
  text: string;
  /** Paths relative to the working root, in the order the user sent them. */
  attachments: string[];
  status: TaskStatus;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  resultText: string | null;
  errorText: string | null;
};

export type NewTask = Pick<Task, "chatId" | "userId" | "username" | "text" | "attachments">;

export type TaskCounts = Record<TaskStatus, number>;

/** Row shape as stored in SQLite (snake_case columns). */
export type TaskRow = {
  id: number;
  chat_id: number;
  user_id: number;
  username: string;
  text: string;
  attachments_json: string;
  status: string;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  result_text: string | null;
  error_text: string | null;
};

/** Read/write access to the key/value metadata table. */
export type MetaStore = {
  getMeta: (key: string, fallback?: string) => string;
  setMeta: (key: string, value: string) => void;
};
