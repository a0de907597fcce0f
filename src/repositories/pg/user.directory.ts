import { z } from "zod";
import { UserDirectory } from "../interfaces";
import { User } from "../../types/account.types";
import { Executor, parseRows, wrapQuery } from "./sql";

const userRow = z.object({ id: z.string(), email: z.string() });

export class PgUserDirectory implements UserDirectory {
  constructor(private readonly exec: Executor) {}

  async findById(id: string): Promise<User | null> {
    return wrapQuery("users.findById", async () => {
      const [user] = parseRows(
        userRow,
        await this.exec(`SELECT id, email FROM users WHERE id = $1`, [id]),
        "users"
      );
      return user ?? null;
    });
  }
}
