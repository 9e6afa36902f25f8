import { registry } from "../core/registry";
import type { Db } from "../db/client";
import { sources } from "../db/schema";

/**
 * Ensure every registered adapter has a corresponding row in the `sources` table.
 * Called once on start-up.
 */
export async function seedSources(db: Db): Promise<void> {
  for (const adapter of registry.getAll()) {
    await db
      .insert(sources)
      .values({
        id: adapter.id,
        name: adapter.name,
        description: adapter.description,
        sourceUrl: adapter.sourceUrl,
        role: adapter.role,
        status: "active",
        createdAt: new Date(),
      })
      .onConflictDoUpdate({
        target: sources.id,
        set: {
          name: adapter.name,
          description: adapter.description,
          sourceUrl: adapter.sourceUrl,
          role: adapter.role,
        },
      });
  }
}
