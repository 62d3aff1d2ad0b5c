import { z } from 'zod';
import type { OverrideRecord } from '../../drugSafety/overrideLedger';
import { ALERT_KINDS, SEVERITIES } from '../../drugSafety/types';
import { RepositoryValidationError } from '../common/errors';
import type { OverrideAuditRepository } from './OverrideAuditRepository';

const DEFAULT_COLLECTION = 'prescriptionOverrideAudits';
const BATCH_WRITE_SIZE = 450;

export const buildOverrideAuditDocId = (record: Pick<OverrideRecord, 'transactionId' | 'sequence'>): string =>
  `${record.transactionId}_${String(record.sequence).padStart(4, '0')}`;

const storedOverrideRecordSchema = z.object({
  transactionId: z.string(),
  sequence: z.number().int().positive(),
  patientId: z.string(),
  visitId: z.string().nullable(),
  prescriptionId: z.string(),
  alertId: z.string(),
  alertKind: z.enum(ALERT_KINDS),
  severity: z.enum(SEVERITIES),
  subject: z.string(),
  decision: z.enum(['proceeded', 'cancelled']),
  reason: z.string().nullable(),
  clinicianId: z.string().nullable(),
  recordedAt: z.string(),
  previousHash: z.string(),
  hash: z.string(),
});

function mapAuditDoc(
  collectionName: string,
  doc: FirebaseFirestore.QueryDocumentSnapshot<FirebaseFirestore.DocumentData>,
): OverrideRecord {
  const parsed = storedOverrideRecordSchema.safeParse(doc.data());
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))].join(', ');
    throw new RepositoryValidationError(
      `${collectionName}/${doc.id}`,
      `Override audit record ${doc.id} is malformed (${fields})`,
    );
  }
  return parsed.data;
}

const bySequence = (a: OverrideRecord, b: OverrideRecord): number => a.sequence - b.sequence;

export class FirestoreOverrideAuditRepository implements OverrideAuditRepository {
  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    private readonly collectionName: string = DEFAULT_COLLECTION,
  ) {}

  private collection() {
    return this.db.collection(this.collectionName);
  }

  private mapDocs(snapshot: FirebaseFirestore.QuerySnapshot<FirebaseFirestore.DocumentData>): OverrideRecord[] {
    return snapshot.docs.map((doc) => mapAuditDoc(this.collectionName, doc));
  }

  async appendRecords(records: readonly OverrideRecord[]): Promise<string[]> {
    if (records.length === 0) {
      return [];
    }

    const ids: string[] = [];
    for (let index = 0; index < records.length; index += BATCH_WRITE_SIZE) {
      const chunk = records.slice(index, index + BATCH_WRITE_SIZE);
      const batch = this.db.batch();
      chunk.forEach((record) => {
        const id = buildOverrideAuditDocId(record);
        batch.create(this.collection().doc(id), { ...record, storedAt: new Date() });
        ids.push(id);
      });
      await batch.commit();
    }

    return ids;
  }

  async listByTransaction(transactionId: string): Promise<OverrideRecord[]> {
    const snapshot = await this.collection().where('transactionId', '==', transactionId).get();
    return this.mapDocs(snapshot).sort(bySequence);
  }

  async listByPrescription(prescriptionId: string): Promise<OverrideRecord[]> {
    const snapshot = await this.collection().where('prescriptionId', '==', prescriptionId).get();
    return this.mapDocs(snapshot).sort((a, b) => a.recordedAt.localeCompare(b.recordedAt) || bySequence(a, b));
  }
}
