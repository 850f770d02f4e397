import { migration20261018AddTodoItems } from "./20261018_add_todo_items.js";
import type { Migration } from "./migrationTypes.js";

export const migrations: Migration[] = [migration20261018AddTodoItems];
