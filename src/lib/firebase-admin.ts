import { cert, getApps, initializeApp, type App } from "firebase-admin/app";
import { getFirestore, type Firestore } from "firebase-admin/firestore";

import type { FirebaseCredentialsConfig } from "./config";

let cachedApp: App | undefined;

type ServiceAccountJson = {
  project_id?: string;
  client_email?: string;
  private_key?: string;
};

function fromServiceAccountKey(key: string, config: FirebaseCredentialsConfig): App | undefined {
  try {
    const parsed = JSON.parse(key) as ServiceAccountJson;
    if (!parsed.client_email || !parsed.private_key) {
      throw new Error("FIREBASE_SERVICE_ACCOUNT_KEY is missing required fields");
    }
    return initializeApp({
      credential: cert({
        projectId: parsed.project_id ?? config.projectId,
        clientEmail: parsed.client_email,
        privateKey: parsed.private_key,
      }),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown error";
    if (config.production) {
      throw new Error(`Invalid FIREBASE_SERVICE_ACCOUNT_KEY configuration: ${message}`);
    }

    console.warn("[firebase-admin] FIREBASE_SERVICE_ACCOUNT_KEY is invalid, falling back", { message });
    return undefined;
  }
}

function getAdminApp(config: FirebaseCredentialsConfig): App {
  if (cachedApp) {
    return cachedApp;
  }

  const existing = getApps();
  if (existing.length) {
    cachedApp = existing[0];
    return cachedApp;
  }

  if (config.serviceAccountKey) {
    const app = fromServiceAccountKey(config.serviceAccountKey, config);
    if (app) {
      cachedApp = app;
      return cachedApp;
    }
  }

  const { privateKey, clientEmail, projectId } = config;
  if (privateKey && clientEmail && projectId) {
    cachedApp = initializeApp({
      credential: cert({
        projectId,
        clientEmail,
        privateKey: privateKey.replace(/\\n/g, "\n"),
      }),
    });
    return cachedApp;
  }

  if (config.production && (privateKey || clientEmail)) {
    throw new Error(
      "Incomplete Firebase Admin credential env vars: FIREBASE_PRIVATE_KEY, FIREBASE_CLIENT_EMAIL, and FIREBASE_PROJECT_ID are all required",
    );
  }

  // Application Default Credentials (GOOGLE_APPLICATION_CREDENTIALS or the hosting environment)
  cachedApp = initializeApp(projectId ? { projectId } : undefined);
  return cachedApp;
}

export function getAdminFirestore(config: FirebaseCredentialsConfig): Firestore {
  return getFirestore(getAdminApp(config));
}
