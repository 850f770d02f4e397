import type { StorageDatabase } from "./databaseOpen.js";
import { TodoItemsRepository } from "./todoItemsRepository.js";

/**
 * Facade for all database access. Owns one connection and the repository instances.
 */
export class Storage {
    readonly connection: StorageDatabase;
    readonly todoItems: TodoItemsRepository;

    private constructor(connection: StorageDatabase) {
        this.connection = connection;
        this.todoItems = new TodoItemsRepository(connection.db);
    }

    static fromDatabase(connection: StorageDatabase): Storage {
        return new Storage(connection);
    }

    close(): Promise<void> {
        return this.connection.close();
    }
}
