import { OverrideTransaction } from '../../../drugSafety/overrideLedger';
import type { OverrideRecord } from '../../../drugSafety/overrideLedger';
import { buildAlert } from '../../../drugSafety/__tests__/fixtures';
import { RepositoryValidationError } from '../../common/errors';
import { buildOverrideAuditDocId, FirestoreOverrideAuditRepository } from '../FirestoreOverrideAuditRepository';

type AuditState = Record<string, Record<string, unknown>>;

function buildFirestoreMock(initialState: AuditState = {}) {
  const state: AuditState = { ...initialState };
  const pendingCreates: Array<{ id: string; data: Record<string, unknown> }> = [];
  const commits: number[] = [];

  const db = {
    collection: jest.fn((name: string) => {
      if (name !== 'prescriptionOverrideAudits') {
        throw new Error(`Unexpected collection: ${name}`);
      }

      return {
        doc: jest.fn((id: string) => ({ id })),
        where: jest.fn((field: string, op: string, value: unknown) => ({
          get: jest.fn(async () => {
            if ((field !== 'transactionId' && field !== 'prescriptionId') || op !== '==') {
              throw new Error(`Unexpected where clause: ${field} ${op}`);
            }

            const docs = Object.entries(state)
              .filter(([, data]) => data[field] === value)
              .map(([id, data]) => ({
                id,
                data: () => data,
              }));

            return {
              docs,
              empty: docs.length === 0,
              size: docs.length,
            };
          }),
        })),
      };
    }),
    batch: jest.fn(() => ({
      create: jest.fn((ref: { id: string }, data: Record<string, unknown>) => {
        pendingCreates.push({ id: ref.id, data });
      }),
      commit: jest.fn(async () => {
        const created = pendingCreates.splice(0, pendingCreates.length);
        created.forEach(({ id }) => {
          if (Object.prototype.hasOwnProperty.call(state, id)) {
            throw new Error(`Document already exists: ${id}`);
          }
        });
        created.forEach(({ id, data }) => {
          state[id] = { ...data };
        });
        commits.push(created.length);
      }),
    })),
  } as unknown as FirebaseFirestore.Firestore;

  return { db, state, commits };
}

function buildRecords(transactionId: string, prescriptionId = 'rx-1', recordedAt = '2026-03-01T10:00:00.000Z') {
  const alerts = [
    buildAlert(),
    buildAlert({ id: 'geriatric:diazepam:older_adult', kind: 'geriatric', severity: 'moderate', overrideRequiresReason: false }),
  ];
  const transaction = new OverrideTransaction({ patientId: 'patient-1', prescriptionId }, alerts, {
    transactionId,
    clinicianId: 'clinician-1',
    now: () => new Date(recordedAt),
  });
  transaction.record(alerts[1], 'proceeded');
  transaction.record(alerts[0], 'proceeded', 'bridge anticoagulation planned');
  return transaction.records;
}

describe('FirestoreOverrideAuditRepository', () => {
  it('builds sortable document ids from the transaction and sequence', () => {
    expect(buildOverrideAuditDocId({ transactionId: 'txn-1', sequence: 3 })).toBe('txn-1_0003');
  });

  it('stores each record under its sequence id with a stored-at stamp', async () => {
    const harness = buildFirestoreMock();
    const repository = new FirestoreOverrideAuditRepository(harness.db);
    const records = buildRecords('txn-1');

    const ids = await repository.appendRecords(records);

    expect(ids).toEqual(['txn-1_0001', 'txn-1_0002']);
    expect(harness.commits).toEqual([2]);
    expect(harness.state['txn-1_0002']).toMatchObject({
      alertId: 'contraindication:metformin:ckd_stage4',
      reason: 'bridge anticoagulation planned',
      hash: records[1].hash,
    });
    expect(harness.state['txn-1_0002'].storedAt).toBeInstanceOf(Date);
  });

  it('writes nothing for an empty list', async () => {
    const harness = buildFirestoreMock();
    const repository = new FirestoreOverrideAuditRepository(harness.db);

    await expect(repository.appendRecords([])).resolves.toEqual([]);
    expect(harness.db.batch).not.toHaveBeenCalled();
  });

  it('refuses to overwrite records that were already stored', async () => {
    const harness = buildFirestoreMock();
    const repository = new FirestoreOverrideAuditRepository(harness.db);
    const records = buildRecords('txn-1');
    await repository.appendRecords(records);

    await expect(repository.appendRecords(records)).rejects.toThrow('Document already exists: txn-1_0001');
  });

  it('lists a transaction in sequence order without the stored-at stamp', async () => {
    const harness = buildFirestoreMock();
    const repository = new FirestoreOverrideAuditRepository(harness.db);
    const records = buildRecords('txn-1');
    await repository.appendRecords([...records].reverse());

    const listed = await repository.listByTransaction('txn-1');

    expect(listed).toEqual(records);
  });

  it('lists every transaction for a prescription in recorded order', async () => {
    const harness = buildFirestoreMock();
    const repository = new FirestoreOverrideAuditRepository(harness.db);
    await repository.appendRecords(buildRecords('txn-2', 'rx-1', '2026-03-01T11:00:00.000Z'));
    await repository.appendRecords(buildRecords('txn-1', 'rx-1', '2026-03-01T10:00:00.000Z'));
    await repository.appendRecords(buildRecords('txn-3', 'rx-2'));

    const listed = await repository.listByPrescription('rx-1');

    expect(listed.map((record: OverrideRecord) => `${record.transactionId}#${record.sequence}`)).toEqual([
      'txn-1#1',
      'txn-1#2',
      'txn-2#1',
      'txn-2#2',
    ]);
  });

  it('rejects malformed stored documents', async () => {
    const harness = buildFirestoreMock({
      'txn-9_0001': { transactionId: 'txn-9', sequence: 'one' },
    });
    const repository = new FirestoreOverrideAuditRepository(harness.db);

    await expect(repository.listByTransaction('txn-9')).rejects.toThrow(RepositoryValidationError);
    await expect(repository.listByTransaction('txn-9')).rejects.toMatchObject({
      code: 'validation_failed',
      documentPath: 'prescriptionOverrideAudits/txn-9_0001',
    });
    await expect(repository.listByTransaction('txn-9')).rejects.toThrow(
      'Override audit record txn-9_0001 is malformed (sequence, patientId,',
    );
  });
});
