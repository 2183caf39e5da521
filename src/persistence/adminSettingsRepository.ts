import type { KeyedLock } from "../keyedLock";
import { getFirestore, serverTimestamp, type FirestoreInstance } from "./firestore";
import { withPersistence } from "./scenarioRepository";
import { sanitizeAdminSettingsDoc, toAdminSettingsColumns } from "./scenarioSchema";
import type { AdminSettings, AdminSettingsPatch, AdminSettingsRepository } from "./types";

const COLLECTION = "adminSettings";
const DOC_ID = "current";

export function applySettingsPatch(current: AdminSettings, patch: AdminSettingsPatch): Omit<AdminSettings, "updatedAtMs"> {
  return {
    scenarioPin: patch.scenarioPin !== undefined ? patch.scenarioPin : current.scenarioPin,
    behaviorPin: patch.behaviorPin !== undefined ? patch.behaviorPin : current.behaviorPin,
    retrievalModePin: patch.retrievalModePin !== undefined ? patch.retrievalModePin : current.retrievalModePin,
    retrievalProbability:
      patch.retrievalProbability !== undefined ? patch.retrievalProbability : current.retrievalProbability,
  };
}

/**
 * Single-document settings store (`adminSettings/current`).
 * Updates read the stored document inside a transaction so concurrent admin
 * edits of different pins do not overwrite each other.
 */
export class FirestoreAdminSettingsRepository implements AdminSettingsRepository {
  constructor(private readonly resolveDb: () => FirestoreInstance | null = getFirestore) {}

  async load(): Promise<AdminSettings> {
    return withPersistence("adminSettings.load", this.resolveDb, async (db) => {
      const snap = await db.collection(COLLECTION).doc(DOC_ID).get();
      return sanitizeAdminSettingsDoc(snap.exists ? snap.data() : {});
    });
  }

  async update(patch: AdminSettingsPatch): Promise<AdminSettings> {
    return withPersistence("adminSettings.update", this.resolveDb, async (db) => {
      const ref = db.collection(COLLECTION).doc(DOC_ID);
      await db.runTransaction(async (tx) => {
        const snap = await tx.get(ref);
        const current = sanitizeAdminSettingsDoc(snap.exists ? snap.data() : {});
        const next = applySettingsPatch(current, patch);
        tx.set(ref, { ...toAdminSettingsColumns(next), updated_at: serverTimestamp() }, { merge: true });
      });
      const saved = await ref.get();
      return sanitizeAdminSettingsDoc(saved.data());
    });
  }
}

/** Serializes in-process writers under the `admin-settings` lock key. */
export class SerializedAdminSettings implements AdminSettingsRepository {
  constructor(
    private readonly inner: AdminSettingsRepository,
    private readonly lock: KeyedLock
  ) {}

  load(): Promise<AdminSettings> {
    return this.inner.load();
  }

  update(patch: AdminSettingsPatch): Promise<AdminSettings> {
    return this.lock.run("admin-settings", "update", () => this.inner.update(patch));
  }
}
