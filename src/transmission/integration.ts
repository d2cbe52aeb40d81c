import type { ShareableResults } from "../assessment/assessment.js";
import type { TransmissionRecord } from "../tracking/record.js";
import type {
  SecureTransmitter,
  TransmissionPackage,
  TransmissionReceipt,
} from "./transmitter.js";

/** Ties shareable assessment results to the tracking record that covers them. */
export class PartnerIntegration {
  constructor(private readonly transmitter: SecureTransmitter) {}

  preparePackage(results: ShareableResults, record: TransmissionRecord): TransmissionPackage {
    return this.transmitter.prepareTransmissionPackage(results, {
      tracking_record_id: record.id,
      classification: record.classification,
      assessment_type: results.assessment_type,
      magnitude: results.findings_count,
    });
  }

  sendAssessment(results: ShareableResults, record: TransmissionRecord): TransmissionReceipt {
    return this.transmitter.deliver(this.preparePackage(results, record));
  }
}
