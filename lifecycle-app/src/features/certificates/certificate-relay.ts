import type { FastifyBaseLogger } from 'fastify';
import type { LifecycleStore } from '../../store.js';
import type { Certificate } from '../../domain/reducers.js';
import type { CheckpointStore } from './checkpoints.js';
import { issuedCertificatesStream } from './list-certificates.js';

export const CERTIFICATE_RELAY_NAME = 'certificate-notifier';

/** Receives each issued certificate; delivery is at-least-once. */
export interface CertificateNotifier {
  notify(certificate: Certificate): Promise<void>;
}

export type RelayLogger = Pick<FastifyBaseLogger, 'info' | 'error'>;

/** Notifier that only writes the certificate to the log. */
export function loggingNotifier(logger: RelayLogger): CertificateNotifier {
  return {
    async notify(certificate) {
      logger.info(
        { certificateId: certificate.certificateId, studentId: certificate.studentId, courseId: certificate.courseId },
        `certificate issued: ${certificate.certificateType}`,
      );
    },
  };
}

export interface RelayOptions {
  checkpoints: CheckpointStore;
  notifier: CertificateNotifier;
  batchSize?: number;
}

/**
 * Hands every certificate issued after the stored checkpoint to the notifier,
 * saving the checkpoint after each one. A notifier failure stops the run with
 * the checkpoint on the last delivered certificate.
 *
 * @returns the number of certificates delivered
 */
export async function relayIssuedCertificates(store: LifecycleStore, options: RelayOptions): Promise<number> {
  const afterPosition = await options.checkpoints.load(CERTIFICATE_RELAY_NAME);
  let delivered = 0;
  for await (const event of store.stream(issuedCertificatesStream(), {
    afterPosition,
    ...(options.batchSize !== undefined ? { batchSize: options.batchSize } : {}),
  })) {
    if (event.type !== 'CertificateIssued') continue;
    await options.notifier.notify(event.payload);
    await options.checkpoints.save(CERTIFICATE_RELAY_NAME, event.globalPosition);
    delivered += 1;
  }
  return delivered;
}

export interface CertificateRelay {
  stop(): Promise<void>;
}

/** Runs the relay now and then every `intervalMs` until stopped. */
export function startCertificateRelay(
  store: LifecycleStore,
  options: RelayOptions & { intervalMs: number; logger: RelayLogger },
): CertificateRelay {
  let stopped = false;
  let timer: NodeJS.Timeout | undefined;
  let running: Promise<void> = Promise.resolve();

  const tick = (): void => {
    running = relayIssuedCertificates(store, options)
      .then((delivered) => {
        if (delivered > 0) options.logger.info({ delivered }, 'certificates relayed');
      })
      .catch((err: unknown) => {
        options.logger.error({ err }, 'certificate relay failed');
      })
      .finally(() => {
        if (!stopped) timer = setTimeout(tick, options.intervalMs);
      });
  };
  tick();

  return {
    async stop() {
      stopped = true;
      if (timer !== undefined) clearTimeout(timer);
      await running;
    },
  };
}
