import { PayloadAction, createAsyncThunk, createSlice } from '@reduxjs/toolkit';

import { toAttendanceError, type AttendanceErrorCode } from '../../lib/errors';
import type { UserProfile } from '../../features/users/types';
import type { AppServices } from '../services';

export type AuthStatus = 'idle' | 'loading' | 'authenticated' | 'error';

export interface AuthState {
  uid: string | null;
  profile: UserProfile | null;
  status: AuthStatus;
  error: { code: AttendanceErrorCode; message: string } | null;
}

const initialState: AuthState = {
  uid: null,
  profile: null,
  status: 'idle',
  error: null,
};

export const loadSession = createAsyncThunk<
  UserProfile | null,
  void,
  { extra: AppServices; rejectValue: NonNullable<AuthState['error']> }
>('auth/loadSession', async (_, { extra, rejectWithValue }) => {
  const uid = extra.identity.currentUserId();
  if (!uid) {
    return null;
  }
  try {
    return await extra.identity.getUserProfile(uid);
  } catch (error) {
    const failure = toAttendanceError(error);
    return rejectWithValue({ code: failure.code, message: failure.message });
  }
});

const authSlice = createSlice({
  name: 'auth',
  initialState,
  reducers: {
    setProfile(state, action: PayloadAction<UserProfile | null>) {
      state.profile = action.payload;
      state.uid = action.payload?.uid ?? null;
      state.status = action.payload ? 'authenticated' : 'idle';
      state.error = null;
    },
    clearSession() {
      return initialState;
    },
  },
  extraReducers: (builder) => {
    builder
      .addCase(loadSession.pending, (state) => {
        state.status = 'loading';
        state.error = null;
      })
      .addCase(loadSession.fulfilled, (state, action) => {
        state.profile = action.payload;
        state.uid = action.payload?.uid ?? null;
        state.status = action.payload ? 'authenticated' : 'idle';
      })
      .addCase(loadSession.rejected, (state, action) => {
        state.profile = null;
        state.status = 'error';
        state.error = action.payload ?? {
          code: 'StorageUnavailable',
          message: action.error.message ?? 'Failed to load profile.',
        };
      });
  },
});

export const { setProfile, clearSession } = authSlice.actions;
export default authSlice.reducer;
