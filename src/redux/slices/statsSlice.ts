// /src/redux/slices/statsSlice.ts

import { createAsyncThunk, createSlice, type PayloadAction } from '@reduxjs/toolkit';
import { operationFailure } from '@/lib/errors';
import type { ThunkConfig } from '@/redux/services';
import type { TaskStatistics } from '@/types/tasks';

export interface StatsState {
    statistics: TaskStatistics | null;
    loading: boolean;
    error: string | null;
}

const initialState: StatsState = {
    statistics: null,
    loading: false,
    error: null,
};

type StatsThunkConfig = ThunkConfig<{ stats: StatsState }>;

// --- ASYNCHRONOUS THUNKS ---

export const loadStatistics = createAsyncThunk<TaskStatistics, void, StatsThunkConfig>(
    'stats/loadStatistics',
    async (_, { extra, rejectWithValue }) => {
        try {
            return await extra.statsApi.fetchStatistics();
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to load statistics', error));
        }
    }
);

// Background refresh: no pending case, so the previous numbers stay on screen
export const refreshStatistics = createAsyncThunk<TaskStatistics, void, StatsThunkConfig>(
    'stats/refreshStatistics',
    async (_, { extra, rejectWithValue }) => {
        try {
            return await extra.statsApi.fetchStatistics();
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to refresh statistics', error));
        }
    }
);

// --- SELECTORS ---
export const selectStatistics = (state: { stats: StatsState }): TaskStatistics | null => state.stats.statistics;
export const selectStatsError = (state: { stats: StatsState }): string | null => state.stats.error;

// --- SLICE DEFINITION ---
const statsSlice = createSlice({
    name: 'stats',
    initialState,
    reducers: {
        clearStatsError: (state) => {
            state.error = null;
        },
    },
    extraReducers: (builder) => {
        const received = (state: StatsState, action: PayloadAction<TaskStatistics>) => {
            state.loading = false;
            state.statistics = action.payload;
            state.error = null;
        };

        builder
            .addCase(loadStatistics.pending, (state) => {
                state.loading = true;
                state.error = null;
            })
            .addCase(loadStatistics.fulfilled, received)
            .addCase(refreshStatistics.fulfilled, received)
            .addCase(loadStatistics.rejected, (state, action) => {
                state.loading = false;
                state.error = action.payload?.message ?? 'Failed to load statistics';
            })
            .addCase(refreshStatistics.rejected, (state, action) => {
                state.error = action.payload?.message ?? 'Failed to refresh statistics';
            });
    },
});

export const { clearStatsError } = statsSlice.actions;
export default statsSlice.reducer;
