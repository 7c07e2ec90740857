import fs from 'fs';
import { z } from 'zod';

export interface CropHistoryEntry {
  cropName: string;
  season?: string;
  year?: number;
}

export interface FarmerProfile {
  farmerId: string;
  name?: string;
  village?: string;
  state?: string;
  /** ISO 639-1 code, e.g. "hi" */
  language: string;
  /** Oldest first */
  cropHistory: CropHistoryEntry[];
}

/**
 * Read side of the profile collaborator. Profile CRUD lives with the
 * collaborator; the recommendation engine only looks profiles up.
 */
export interface FarmerProfileStore {
  findById(farmerId: string): Promise<FarmerProfile | null>;
}

const profileSchema = z.object({
  farmerId: z.string().min(1),
  name: z.string().optional(),
  village: z.string().optional(),
  state: z.string().optional(),
  language: z.string().default('en'),
  cropHistory: z
    .array(
      z.object({
        cropName: z.string().min(1),
        season: z.string().optional(),
        year: z.number().int().optional(),
      }),
    )
    .default([]),
});

export class InMemoryFarmerProfileStore implements FarmerProfileStore {
  private readonly profiles = new Map<string, FarmerProfile>();

  constructor(profiles: FarmerProfile[] = []) {
    for (const profile of profiles) {
      this.profiles.set(profile.farmerId, profile);
    }
  }

  /** Load profiles from a JSON array file, validating every entry. */
  static fromFile(filePath: string): InMemoryFarmerProfileStore {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return new InMemoryFarmerProfileStore(z.array(profileSchema).parse(raw));
  }

  async findById(farmerId: string): Promise<FarmerProfile | null> {
    return Promise.resolve(this.profiles.get(farmerId) ?? null);
  }
}

/** Names of the last `count` crops grown, oldest first. */
export function recentCrops(profile: FarmerProfile, count = 5): string[] {
  return profile.cropHistory.slice(-count).map((entry) => entry.cropName);
}
