import { NewsRecordInput, UserKeyword } from '../../src/database/models';
import { NewsGateway } from '../../src/remote/NewsApiClient';

export const createFakeGateway = () => ({
  fetchNews: jest.fn(
    async (_userId: string, _page: number, _limit: number): Promise<NewsRecordInput[]> => [],
  ),
  fetchPersonalizedNews: jest.fn(
    async (_userId: string, _limit: number): Promise<NewsRecordInput[]> => [],
  ),
  searchNews: jest.fn(
    async (
      _userId: string,
      _query: string,
      _page: number,
      _limit: number,
    ): Promise<NewsRecordInput[]> => [],
  ),
  fetchUserKeywords: jest.fn(async (_userId: string): Promise<UserKeyword[]> => []),
}) satisfies NewsGateway;

export type FakeGateway = ReturnType<typeof createFakeGateway>;
