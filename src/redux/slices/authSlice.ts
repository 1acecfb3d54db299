// /src/redux/slices/authSlice.ts

import { createAsyncThunk, createSlice, type PayloadAction } from '@reduxjs/toolkit';
import { operationFailure } from '@/lib/errors';
import type { ThunkConfig } from '@/redux/services';
import type { User } from '@/types/tasks';

export interface AuthState {
    user: User | null;
    isAuthenticated: boolean;
    loading: boolean;
    error: string | null;
}

const initialState: AuthState = {
    user: null,
    isAuthenticated: false,
    loading: false,
    error: null,
};

type AuthThunkConfig = ThunkConfig<{ auth: AuthState }>;

export interface Credentials {
    email: string;
    password: string;
}

export interface Registration extends Credentials {
    name: string;
}

// --- ASYNCHRONOUS THUNKS ---

// Restores the user from the persisted session; an unreadable session counts as logged out
export const checkAuthStatus = createAsyncThunk<User | null, void, AuthThunkConfig>(
    'auth/checkAuthStatus',
    async (_, { extra, rejectWithValue }) => {
        try {
            return (await extra.authApi.getCurrentUser()) ?? null;
        } catch (error) {
            return rejectWithValue(operationFailure('Failed to restore session', error));
        }
    }
);

export const loginUser = createAsyncThunk<User, Credentials, AuthThunkConfig>(
    'auth/loginUser',
    async ({ email, password }, { extra, rejectWithValue }) => {
        try {
            return await extra.authApi.login(email, password);
        } catch (error) {
            return rejectWithValue(operationFailure('Login failed', error));
        }
    }
);

export const registerUser = createAsyncThunk<User, Registration, AuthThunkConfig>(
    'auth/registerUser',
    async ({ name, email, password }, { extra, rejectWithValue }) => {
        try {
            return await extra.authApi.register(name, email, password);
        } catch (error) {
            return rejectWithValue(operationFailure('Registration failed', error));
        }
    }
);

// The task cache belongs to the session, so it goes with it
export const logoutUser = createAsyncThunk<void, void, AuthThunkConfig>(
    'auth/logoutUser',
    async (_, { extra, rejectWithValue }) => {
        extra.taskCache.replaceAll([]);
        try {
            await extra.authApi.logout();
        } catch (error) {
            return rejectWithValue(operationFailure('Logout failed', error));
        }
    }
);

// --- SLICE DEFINITION ---

const authSlice = createSlice({
    name: 'auth',
    initialState,
    reducers: {
        clearAuthError(state) {
            state.error = null;
        },
    },
    extraReducers: (builder) => {
        const authenticated = (state: AuthState, action: PayloadAction<User>) => {
            state.user = action.payload;
            state.isAuthenticated = true;
            state.loading = false;
            state.error = null;
        };

        builder
            .addCase(checkAuthStatus.pending, (state) => {
                state.loading = true;
            })
            .addCase(checkAuthStatus.fulfilled, (state, action) => {
                state.user = action.payload;
                state.isAuthenticated = action.payload !== null;
                state.loading = false;
            })
            .addCase(checkAuthStatus.rejected, (state) => {
                state.user = null;
                state.isAuthenticated = false;
                state.loading = false;
            })

            .addCase(loginUser.pending, (state) => {
                state.loading = true;
                state.error = null;
            })
            .addCase(loginUser.fulfilled, authenticated)
            .addCase(loginUser.rejected, (state, action) => {
                state.loading = false;
                state.error = action.payload?.reason ?? action.error.message ?? 'Login failed';
            })

            .addCase(registerUser.pending, (state) => {
                state.loading = true;
                state.error = null;
            })
            .addCase(registerUser.fulfilled, authenticated)
            .addCase(registerUser.rejected, (state, action) => {
                state.loading = false;
                state.error = action.payload?.reason ?? action.error.message ?? 'Registration failed';
            })

            // Local state goes regardless of whether the session file could be removed
            .addCase(logoutUser.fulfilled, () => initialState)
            .addCase(logoutUser.rejected, (_state, action) => ({
                ...initialState,
                error: action.payload?.message ?? null,
            }));
    },
});

export const { clearAuthError } = authSlice.actions;
export default authSlice.reducer;
