import { isRecord } from '../shared/json.js';
import { TraceSyncError } from './errors.js';
import { microsoftApiRequest, readODataPage } from './microsoftApi.js';

export interface DirectoryDomain {
  id: string;
  isVerified: boolean;
}

export interface DirectoryService {
  listDomains(accessToken: string): Promise<DirectoryDomain[]>;
}

const MAX_DOMAIN_PAGES = 50;

const toDirectoryDomain = (entry: unknown): DirectoryDomain => {
  if (!isRecord(entry) || typeof entry.id !== 'string' || typeof entry.isVerified !== 'boolean') {
    throw new TraceSyncError('UnexpectedResponse', 'Directory domain entry is missing id or isVerified');
  }
  return { id: entry.id, isVerified: entry.isVerified };
};

export const createGraphDirectoryService = (options: { graphBaseUrl: string }): DirectoryService => ({
  async listDomains(accessToken) {
    const domains: DirectoryDomain[] = [];
    let url: string | undefined = `${options.graphBaseUrl}/v1.0/domains?$select=id,isVerified`;
    let pages = 0;

    while (url) {
      pages += 1;
      if (pages > MAX_DOMAIN_PAGES) {
        throw new TraceSyncError('UnexpectedResponse', 'Directory domain listing did not terminate');
      }
      let payload: unknown;
      try {
        payload = await microsoftApiRequest(url, accessToken, 'Directory domains');
      } catch (error) {
        if (error instanceof TraceSyncError && error.kind === 'PermissionDenied') {
          throw new TraceSyncError(
            'PermissionDenied',
            `${error.message} (the application needs the Domain.Read.All permission)`,
            { cause: error },
          );
        }
        throw error;
      }
      const page = readODataPage(payload, 'Directory domains');
      domains.push(...page.value.map(toDirectoryDomain));
      url = page.nextLink;
    }

    return domains;
  },
});
