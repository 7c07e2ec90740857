import { CropName } from '../catalog/cropCatalog';

export interface RecommendationFeedback {
  farmerId: string;
  cropName: CropName;
  /** 1..5 */
  rating: number;
  comment?: string;
  /** ISO-8601 */
  createdAt: string;
}

/** Where farmers' ratings of recommended crops are kept for later model tuning. */
export interface FeedbackStore {
  add(feedback: RecommendationFeedback): Promise<void>;
  listByFarmer(farmerId: string): Promise<RecommendationFeedback[]>;
}

export class InMemoryFeedbackStore implements FeedbackStore {
  private readonly entries: RecommendationFeedback[] = [];

  async add(feedback: RecommendationFeedback): Promise<void> {
    this.entries.push(feedback);
    return Promise.resolve();
  }

  async listByFarmer(farmerId: string): Promise<RecommendationFeedback[]> {
    return Promise.resolve(this.entries.filter((entry) => entry.farmerId === farmerId));
  }
}
