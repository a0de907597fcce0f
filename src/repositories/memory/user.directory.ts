import { UserDirectory } from "../interfaces";
import { User } from "../../types/account.types";
import { MemoryStore, copy } from "./memory-store";

export class MemoryUserDirectory implements UserDirectory {
  constructor(private readonly store: MemoryStore) {}

  add(user: User): void {
    this.store.users.set(user.id, copy(user));
  }

  async findById(id: string): Promise<User | null> {
    const user = this.store.users.get(id);
    return user ? copy(user) : null;
  }
}
