import admin from "firebase-admin";
import { logWarn } from "../logger";

// Lazily initialised firebase-admin app for the case gateway.
// Credentials come from FIREBASE_SERVICE_ACCOUNT (inline JSON) or the
// application-default chain (GOOGLE_APPLICATION_CREDENTIALS, emulator host).
// Importing this module never throws; callers get null when Firestore is unusable.

let app: admin.app.App | null = null;
let firestoreInstance: admin.firestore.Firestore | null = null;
let warned = false;

function warnOnce(message: string, err?: unknown) {
  if (warned) return;
  warned = true;
  logWarn(`[firestore] ${message}`, err ?? "");
}

function credentialFromEnv(): admin.credential.Credential | undefined {
  const inline = process.env.FIREBASE_SERVICE_ACCOUNT;
  if (!inline) return undefined;
  try {
    const parsed: admin.ServiceAccount = JSON.parse(inline);
    return admin.credential.cert(parsed);
  } catch (err) {
    warnOnce("FIREBASE_SERVICE_ACCOUNT is not valid service-account JSON", err);
    return undefined;
  }
}

function hasAnyCredentialSource(): boolean {
  return Boolean(
    process.env.FIREBASE_SERVICE_ACCOUNT ||
      process.env.GOOGLE_APPLICATION_CREDENTIALS ||
      process.env.FIRESTORE_EMULATOR_HOST
  );
}

function initApp(): admin.app.App | null {
  if (app) return app;
  if (!hasAnyCredentialSource()) {
    warnOnce("No Firebase credentials configured; scenario storage is unavailable");
    return null;
  }
  try {
    const credential = credentialFromEnv();
    app = credential ? admin.initializeApp({ credential }) : admin.initializeApp();
    return app;
  } catch (err) {
    warnOnce("firebase-admin init failed; scenario storage is unavailable", err);
    return null;
  }
}

export function getFirestore(): admin.firestore.Firestore | null {
  if (firestoreInstance) return firestoreInstance;
  const initialized = initApp();
  if (!initialized) return null;
  const db = admin.firestore(initialized);
  db.settings({ ignoreUndefinedProperties: true });
  firestoreInstance = db;
  return db;
}

export function serverTimestamp(): admin.firestore.FieldValue {
  return admin.firestore.FieldValue.serverTimestamp();
}

export type FirestoreInstance = admin.firestore.Firestore;
export type DocumentSnapshot = admin.firestore.DocumentSnapshot;
