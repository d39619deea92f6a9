export { BaseRepository } from './base-repository';
export { PostgresProposalStore } from './proposal-repository';
export { PostgresReviewStore } from './review-repository';
