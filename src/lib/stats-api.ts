// /src/lib/stats-api.ts

import type { AxiosInstance } from 'axios';
import { readData } from '@/lib/apiClient';
import { STATS_ENDPOINT } from '@/lib/config';
import { statisticsSchema } from '@/lib/schemas';
import type { TaskStatistics } from '@/types/tasks';

export interface StatsApi {
    fetchStatistics(): Promise<TaskStatistics>;
}

/**
 * Counts of the current user's tasks, broken down by status and priority.
 */
export const createStatsApi = (apiClient: AxiosInstance): StatsApi => ({
    fetchStatistics: async () => {
        const response = await apiClient.get<unknown>(STATS_ENDPOINT);
        return readData(response, statisticsSchema);
    },
});
