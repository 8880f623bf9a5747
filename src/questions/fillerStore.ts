import { promises as fs } from 'fs';
import { z } from 'zod';
import type { FillerSource } from './types';

const FillerFileSchema = z.object({
  followups: z.record(z.string().min(1)).default({}),
  generic: z.array(z.string().min(1)).min(1),
});

export type FillerDefinitions = z.input<typeof FillerFileSchema>;

/** Short phrases spoken while a follow-up is being prepared. */
export class FillerStore implements FillerSource {
  private constructor(
    private readonly followups: Record<string, string>,
    private readonly generic: string[],
    private readonly random: () => number,
  ) {}

  public static fromDefinitions(definitions: unknown, random: () => number = Math.random): FillerStore {
    const parsed = FillerFileSchema.parse(definitions);
    return new FillerStore(parsed.followups, parsed.generic, random);
  }

  public static async load(filePath: string): Promise<FillerStore> {
    const raw = await fs.readFile(filePath, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    return FillerStore.fromDefinitions(parsed);
  }

  public getFiller(questionIndex: number): string {
    const specific = this.followups[`state_${questionIndex}_followup`];
    if (specific) {
      return specific;
    }
    const pick = Math.min(Math.floor(this.random() * this.generic.length), this.generic.length - 1);
    return this.generic[pick];
  }
}
