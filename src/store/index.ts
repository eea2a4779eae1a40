import { combineReducers, configureStore } from '@reduxjs/toolkit';

import attendanceReducer from './slices/attendanceSlice';
import authReducer from './slices/authSlice';
import type { AppServices } from './services';

const rootReducer = combineReducers({
  auth: authReducer,
  attendance: attendanceReducer,
});

export const createAppStore = (services: AppServices) =>
  configureStore({
    reducer: rootReducer,
    middleware: (getDefaultMiddleware) =>
      getDefaultMiddleware({
        thunk: { extraArgument: services },
      }),
  });

export type AppStore = ReturnType<typeof createAppStore>;
export type RootState = ReturnType<typeof rootReducer>;
export type AppDispatch = AppStore['dispatch'];
export type { AppServices } from './services';
