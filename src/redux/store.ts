// /src/redux/store.ts

import { combineReducers, configureStore } from '@reduxjs/toolkit';
import type { AppServices } from './services';
import authReducer from './slices/authSlice';
import statsReducer from './slices/statsSlice';
import tasksReducer from './slices/tasksSlice';

const rootReducer = combineReducers({
    auth: authReducer,
    stats: statsReducer,
    tasks: tasksReducer,
});

/**
 * One store per session. The services reach the thunks as their `extra`
 * argument, which is also how the task cache stays out of the state tree.
 */
export const createAppStore = (services: AppServices) =>
    configureStore({
        reducer: rootReducer,
        middleware: (getDefaultMiddleware) =>
            getDefaultMiddleware({
                thunk: { extraArgument: services },
            }),
    });

//Define types for global state and for dispatch
export type AppStore = ReturnType<typeof createAppStore>;
export type RootState = ReturnType<typeof rootReducer>;
export type AppDispatch = AppStore['dispatch'];
