/**
 * backend/src/shared/qr/qrcode-file-store.ts
 *
 * File-system EnrollmentQrStore: renders PNGs with `qrcode` into a directory.
 * The reference is the file path relative to the process working directory.
 */

import path from 'node:path';
import { mkdir, rm } from 'node:fs/promises';
import QRCode from 'qrcode';

import { enrollmentPayload, type EnrollmentQrInput, type EnrollmentQrStore } from './enrollment-qr-store';

export class QrCodeFileStore implements EnrollmentQrStore {
  constructor(private readonly dir: string) {}

  async create(input: EnrollmentQrInput): Promise<string> {
    await mkdir(this.dir, { recursive: true });

    const reference = path.join(this.dir, `customer_${input.customerId}.png`);
    await QRCode.toFile(reference, enrollmentPayload(input), { type: 'png' });

    return reference;
  }

  async remove(reference: string): Promise<void> {
    await rm(reference, { force: true });
  }
}
