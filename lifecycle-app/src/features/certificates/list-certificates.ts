import type { LifecycleStore } from '../../store.js';
import type { Certificate } from '../../domain/reducers.js';
import { lifecycleQuery } from '../../domain/streams.js';

export function issuedCertificatesStream() {
  return lifecycleQuery.eventsOfType('CertificateIssued');
}

export async function listCertificates(store: LifecycleStore, input: { studentId: string }): Promise<Certificate[]> {
  const { events } = await store.load(issuedCertificatesStream().where({ studentId: input.studentId }));
  const certificates: Certificate[] = [];
  for (const event of events) {
    if (event.type === 'CertificateIssued') certificates.push(event.payload);
  }
  return certificates;
}
