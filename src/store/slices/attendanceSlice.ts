import { createAsyncThunk, createSlice } from '@reduxjs/toolkit';

import {
  toAttendanceError,
  type AttendanceErrorCode,
  type GeofenceViolation,
} from '../../lib/errors';
import { attendanceStateOf } from '../../features/attendance/ledger';
import type {
  AttendanceAction,
  AttendanceRecord,
  AttendanceState,
} from '../../features/attendance/types';
import type { AppServices } from '../services';

export interface AttendanceDaySummary {
  dateKey: string;
  state: AttendanceState;
  checkInAt: string | null;
  checkOutAt: string | null;
  branchName: string | null;
}

export interface AttendanceFailure {
  action: AttendanceAction | 'loadToday';
  code: AttendanceErrorCode;
  message: string;
  requiresRemediation: boolean;
  geofence: GeofenceViolation | null;
}

export interface AttendanceResult {
  action: AttendanceAction;
  dateKey: string;
  branchId: string;
  branchName: string;
  distanceMeters: number;
  today: AttendanceDaySummary;
}

export interface AttendanceSliceState {
  today: AttendanceDaySummary | null;
  loadingToday: boolean;
  /** The action awaiting its outcome; a second one is refused until it settles. */
  pending: AttendanceAction | null;
  lastResult: AttendanceResult | null;
  error: AttendanceFailure | null;
}

const initialState: AttendanceSliceState = {
  today: null,
  loadingToday: false,
  pending: null,
  lastResult: null,
  error: null,
};

type AttendanceThunkConfig = {
  extra: AppServices;
  state: { attendance: AttendanceSliceState };
  rejectValue: AttendanceFailure;
};

export const summarizeDay = (dateKey: string, record: AttendanceRecord | null): AttendanceDaySummary => ({
  dateKey,
  state: attendanceStateOf(record),
  checkInAt: record?.checkIn?.toISOString() ?? null,
  checkOutAt: record?.checkOut?.toISOString() ?? null,
  branchName: record?.checkInBranch?.branchName ?? null,
});

const toFailure = (action: AttendanceFailure['action'], error: unknown): AttendanceFailure => {
  const failure = toAttendanceError(error);
  return {
    action,
    code: failure.code,
    message: failure.message,
    requiresRemediation: failure.requiresRemediation,
    geofence: failure.geofence,
  };
};

const createAttendanceThunk = (action: AttendanceAction) =>
  createAsyncThunk<AttendanceResult, void, AttendanceThunkConfig>(
    `attendance/${action}`,
    async (_, { extra, rejectWithValue }) => {
      try {
        const outcome =
          action === 'checkIn' ? await extra.engine.checkIn() : await extra.engine.checkOut();
        return {
          action,
          dateKey: outcome.dateKey,
          branchId: outcome.branch.id,
          branchName: outcome.branch.name,
          distanceMeters: outcome.distanceMeters,
          today: summarizeDay(outcome.dateKey, outcome.record),
        };
      } catch (error) {
        return rejectWithValue(toFailure(action, error));
      }
    },
    {
      condition: (_, { getState }) => getState().attendance.pending === null,
    },
  );

export const checkIn = createAttendanceThunk('checkIn');
export const checkOut = createAttendanceThunk('checkOut');

export const loadToday = createAsyncThunk<AttendanceDaySummary, void, AttendanceThunkConfig>(
  'attendance/loadToday',
  async (_, { extra, rejectWithValue }) => {
    try {
      const { dateKey, record } = await extra.engine.today();
      return summarizeDay(dateKey, record);
    } catch (error) {
      return rejectWithValue(toFailure('loadToday', error));
    }
  },
);

const attendanceSlice = createSlice({
  name: 'attendance',
  initialState,
  reducers: {
    clearAttendanceError(state) {
      state.error = null;
    },
    resetAttendance() {
      return initialState;
    },
  },
  extraReducers: (builder) => {
    for (const thunk of [checkIn, checkOut]) {
      builder
        .addCase(thunk.pending, (state, action) => {
          state.pending = action.type === checkIn.pending.type ? 'checkIn' : 'checkOut';
          state.error = null;
        })
        .addCase(thunk.fulfilled, (state, action) => {
          state.pending = null;
          state.lastResult = action.payload;
          state.today = action.payload.today;
        })
        .addCase(thunk.rejected, (state, action) => {
          state.pending = null;
          state.error = action.payload ?? {
            action: action.type === checkIn.rejected.type ? 'checkIn' : 'checkOut',
            code: 'StorageUnavailable',
            message: action.error.message ?? 'Attendance action failed.',
            requiresRemediation: false,
            geofence: null,
          };
        });
    }

    builder
      .addCase(loadToday.pending, (state) => {
        state.loadingToday = true;
      })
      .addCase(loadToday.fulfilled, (state, action) => {
        state.loadingToday = false;
        state.today = action.payload;
      })
      .addCase(loadToday.rejected, (state, action) => {
        state.loadingToday = false;
        state.error = action.payload ?? {
          action: 'loadToday',
          code: 'StorageUnavailable',
          message: action.error.message ?? 'Failed to load attendance.',
          requiresRemediation: false,
          geofence: null,
        };
      });
  },
});

export const { clearAttendanceError, resetAttendance } = attendanceSlice.actions;
export default attendanceSlice.reducer;
