/**
 * Task as returned to clients
 */
export interface Task {
  id: number;
  title: string;
  description: string | null;
  completed: boolean;
  due_date: string | null;
  owner_id: number;
  created_at: string;
  updated_at: string;
}

/**
 * Task row as SQLite returns it (booleans are stored as 0/1)
 */
export interface TaskRow extends Omit<Task, 'completed'> {
  completed: number;
}

export interface NewTask {
  title: string;
  description?: string | null;
  due_date?: string | null;
}

/**
 * Fields of a partial update. A key that is absent is left unchanged;
 * description and due_date may be set to null to clear them.
 */
export interface TaskChanges {
  title?: string;
  description?: string | null;
  completed?: boolean;
  due_date?: string | null;
}
