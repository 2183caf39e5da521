import { DuplicateScenarioError, PersistenceUnavailableError, ScenarioValidationError, isGatewayError } from "../errors";
import { getFirestore, serverTimestamp, type DocumentSnapshot, type FirestoreInstance } from "./firestore";
import { sanitizeScenarioDoc, toScenarioColumns } from "./scenarioSchema";
import type { Scenario, ScenarioInput, ScenarioRepository } from "./types";

const COLLECTION = "scenarios";

/**
 * Run a Firestore operation, translating transport/SDK failures into
 * PersistenceUnavailableError. Domain errors raised inside pass through.
 */
export async function withPersistence<T>(
  operation: string,
  resolveDb: () => FirestoreInstance | null,
  fn: (db: FirestoreInstance) => Promise<T>
): Promise<T> {
  const db = resolveDb();
  if (!db) throw new PersistenceUnavailableError(operation);
  try {
    return await fn(db);
  } catch (err) {
    if (isGatewayError(err)) throw err;
    throw new PersistenceUnavailableError(operation, err);
  }
}

export class FirestoreScenarioRepository implements ScenarioRepository {
  constructor(private readonly resolveDb: () => FirestoreInstance | null = getFirestore) {}

  async list(): Promise<Scenario[]> {
    return withPersistence("scenarios.list", this.resolveDb, async (db) => {
      const snap = await db.collection(COLLECTION).orderBy("szenario").get();
      const scenarios: Scenario[] = [];
      for (const doc of snap.docs) {
        const scenario = sanitizeScenarioDoc(doc.id, doc.data());
        if (scenario) scenarios.push(scenario);
      }
      return scenarios;
    });
  }

  async findByName(name: string): Promise<Scenario | null> {
    return withPersistence("scenarios.findByName", this.resolveDb, async (db) => {
      const snap = await db.collection(COLLECTION).where("szenario", "==", name.trim()).limit(1).get();
      const doc = snap.docs[0];
      return doc ? sanitizeScenarioDoc(doc.id, doc.data()) : null;
    });
  }

  async create(input: ScenarioInput): Promise<Scenario> {
    return withPersistence("scenarios.create", this.resolveDb, async (db) => {
      const col = db.collection(COLLECTION);
      const ref = col.doc();
      await db.runTransaction(async (tx) => {
        const clash = await tx.get(col.where("szenario", "==", input.name).limit(1));
        if (!clash.empty) throw new DuplicateScenarioError(input.name);
        tx.set(ref, {
          ...toScenarioColumns(input),
          amboss_input: null,
          created_at: serverTimestamp(),
          updated_at: serverTimestamp(),
        });
      });
      return this.readBack(ref.id, await ref.get());
    });
  }

  async update(id: string, input: ScenarioInput): Promise<Scenario> {
    return withPersistence("scenarios.update", this.resolveDb, async (db) => {
      const col = db.collection(COLLECTION);
      const ref = col.doc(id);
      await db.runTransaction(async (tx) => {
        const current = await tx.get(ref);
        if (!current.exists) throw new ScenarioValidationError([`id: unknown scenario ${id}`]);
        const clash = await tx.get(col.where("szenario", "==", input.name).limit(2));
        if (clash.docs.some((doc) => doc.id !== id)) throw new DuplicateScenarioError(input.name);
        tx.update(ref, { ...toScenarioColumns(input), updated_at: serverTimestamp() });
      });
      return this.readBack(id, await ref.get());
    });
  }

  async remove(id: string): Promise<void> {
    await withPersistence("scenarios.remove", this.resolveDb, async (db) => {
      await db.collection(COLLECTION).doc(id).delete();
    });
  }

  async setReferenceText(id: string, text: string): Promise<void> {
    await withPersistence("scenarios.setReferenceText", this.resolveDb, async (db) => {
      await db.collection(COLLECTION).doc(id).update({ amboss_input: text, updated_at: serverTimestamp() });
    });
  }

  async ping(): Promise<void> {
    await withPersistence("scenarios.ping", this.resolveDb, async (db) => {
      await db.collection(COLLECTION).limit(1).get();
    });
  }

  private readBack(id: string, snap: DocumentSnapshot): Scenario {
    const scenario = sanitizeScenarioDoc(id, snap.data());
    if (!scenario) throw new ScenarioValidationError([`id: stored scenario ${id} is unreadable`]);
    return scenario;
  }
}
