import { FileSnapshotProvider } from '@/data-sources/file-provider.ts';
import { HttpSnapshotProvider } from '@/data-sources/http-provider.ts';
import type { AppConfig } from '@/utils/config.ts';
import type { DataProvider } from '@/data-sources/types.ts';

export const createDataProvider = (snapshots: AppConfig['snapshots']): DataProvider => {
  if (snapshots.source === 'http') {
    if (!snapshots.apiUrl) throw new Error('SNAPSHOT_API_URL is required when SNAPSHOT_SOURCE=http');
    return new HttpSnapshotProvider({ baseUrl: snapshots.apiUrl, apiKey: snapshots.apiKey });
  }
  return new FileSnapshotProvider(snapshots.dir);
};
