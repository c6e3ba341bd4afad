import { onRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import { createApp } from './app';
import { initSentry } from './utils/sentry';

// Initialize Sentry BEFORE other initializations
initSentry();

admin.initializeApp();

export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '512MiB',
    maxInstances: 100,
  },
  createApp()
);
