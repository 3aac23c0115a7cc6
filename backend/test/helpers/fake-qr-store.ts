import {
  enrollmentPayload,
  type EnrollmentQrInput,
  type EnrollmentQrStore,
} from '../../src/shared/qr/enrollment-qr-store';

/**
 * WHY:
 * - Customer enrollment writes a PNG per customer; tests must not touch the disk.
 *
 * RULES:
 * - Test-only. Records the payload per reference so tests can assert on it.
 * - failCreate / failRemove simulate storage failures.
 */
export class FakeQrStore implements EnrollmentQrStore {
  readonly artifacts = new Map<string, string>();
  readonly removed: string[] = [];

  failCreate = false;
  failRemove = false;

  create(input: EnrollmentQrInput): Promise<string> {
    if (this.failCreate) return Promise.reject(new Error('qr storage unavailable'));

    const reference = `qrcodes/customer_${input.customerId}.png`;
    this.artifacts.set(reference, enrollmentPayload(input));
    return Promise.resolve(reference);
  }

  remove(reference: string): Promise<void> {
    if (this.failRemove) return Promise.reject(new Error('qr storage unavailable'));

    this.removed.push(reference);
    this.artifacts.delete(reference);
    return Promise.resolve();
  }
}
