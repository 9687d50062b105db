/**
 * Synthetic healthcare rows for test fixtures
 *
 * Every generated id carries a reserved prefix so TestDataCleaner can find it.
 * Seed the factory to get the same rows on every run.
 */

import { Faker, en } from '@faker-js/faker';
import { DEFAULT_AUDIT_RECENCY_WINDOW_MS, type AuditAction } from '@vitalcheck/types';

export const FIXTURE_PATIENT_PREFIX = 'TEST_';
export const FIXTURE_USER_PREFIX = 'TESTUSER_';

const CONDITIONS = [
  'Hypertension',
  'Diabetes Type 2',
  'Asthma',
  'COPD',
  'Arthritis',
  'Depression',
  'Anxiety',
  'Migraine',
] as const;

const MEDICATIONS = [
  'Lisinopril',
  'Metformin',
  'Albuterol',
  'Atorvastatin',
  'Omeprazole',
  'Ibuprofen',
  'Acetaminophen',
  'Aspirin',
] as const;

const ALLERGENS = ['Penicillin', 'Peanuts', 'Latex', 'Shellfish', 'Sulfa', 'Pollen'] as const;

const APPOINTMENT_TYPES = ['Annual Physical', 'Follow-up', 'Consultation', 'Urgent Care'] as const;

const SPECIALTIES = ['Internal Medicine', 'Cardiology', 'Pediatrics', 'Emergency Medicine'] as const;

export type Gender = 'M' | 'F' | 'O';

export type PatientFixture = {
  patient_id: string;
  first_name: string | null;
  last_name: string | null;
  date_of_birth: string | null;
  gender: Gender | null;
  social_security_number: string;
  phone_number: string;
  email: string;
  city: string;
  state: string;
  zip_code: string;
};

export type ProviderFixture = {
  provider_id: string;
  first_name: string;
  last_name: string;
  specialty: string;
  license_number: string;
};

export type MedicalRecordFixture = {
  record_id: string;
  patient_id: string;
  provider_id: string | null;
  visit_date: string;
  chief_complaint: string;
  diagnosis: string;
};

export type VitalSignFixture = {
  record_id: string;
  blood_pressure_systolic: number;
  blood_pressure_diastolic: number;
  heart_rate: number;
  temperature: number;
};

export type MedicationFixture = {
  patient_id: string;
  medication_name: string;
  dosage: string;
  frequency: string;
  start_date: string;
  prescribed_by: string | null;
};

export type AllergyFixture = {
  patient_id: string;
  allergen: string;
  reaction: string;
  severity: 'MILD' | 'MODERATE' | 'SEVERE';
};

export type AppointmentFixture = {
  appointment_id: string;
  patient_id: string;
  provider_id: string;
  appointment_type: string;
  appointment_date: string;
  appointment_time: string;
  duration_minutes: number;
  status: 'SCHEDULED';
};

export type UserFixture = {
  user_id: string;
  username: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  role: 'ADMIN' | 'DOCTOR' | 'NURSE' | 'RECEPTIONIST' | 'TECHNICIAN';
  provider_id: string | null;
};

export type AuditEventFixture = {
  patient_id: string | null;
  user_id: string;
  action: AuditAction;
  table_name: string | null;
  record_id: string | null;
  old_values: Record<string, unknown> | null;
  new_values: Record<string, unknown> | null;
  created_date: Date;
};

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export interface FixtureFactoryOptions {
  /** Seed for reproducible data */
  seed?: number;
  patientPrefix?: string;
  userPrefix?: string;
}

export class FixtureFactory {
  private readonly faker: Faker;
  private readonly patientPrefix: string;
  private readonly userPrefix: string;

  constructor(options: FixtureFactoryOptions = {}) {
    this.faker = new Faker({ locale: [en] });
    if (options.seed !== undefined) {
      this.faker.seed(options.seed);
    }
    this.patientPrefix = options.patientPrefix ?? FIXTURE_PATIENT_PREFIX;
    this.userPrefix = options.userPrefix ?? FIXTURE_USER_PREFIX;
  }

  private digits(length: number): string {
    return this.faker.string.numeric({ length, allowLeadingZeros: true });
  }

  patient(overrides: Partial<PatientFixture> = {}): PatientFixture {
    const gender = this.faker.helpers.arrayElement<Gender>(['M', 'F', 'O']);
    const sex = gender === 'M' ? 'male' : gender === 'F' ? 'female' : undefined;

    return {
      patient_id: `${this.patientPrefix}${this.digits(8)}`,
      first_name: this.faker.person.firstName(sex),
      last_name: this.faker.person.lastName(),
      date_of_birth: toIsoDate(this.faker.date.birthdate({ min: 18, max: 90, mode: 'age' })),
      gender,
      social_security_number: `${this.digits(3)}-${this.digits(2)}-${this.digits(4)}`,
      phone_number: `555-${this.digits(3)}-${this.digits(4)}`,
      email: this.faker.internet.email().toLowerCase(),
      city: this.faker.location.city(),
      state: this.faker.location.state({ abbreviated: true }),
      zip_code: this.faker.location.zipCode('#####'),
      ...overrides,
    };
  }

  provider(overrides: Partial<ProviderFixture> = {}): ProviderFixture {
    return {
      provider_id: `${this.patientPrefix}PRV_${this.digits(6)}`,
      first_name: this.faker.person.firstName(),
      last_name: this.faker.person.lastName(),
      specialty: this.faker.helpers.arrayElement(SPECIALTIES),
      license_number: `MD${this.digits(6)}`,
      ...overrides,
    };
  }

  medicalRecord(
    patientId: string,
    overrides: Partial<MedicalRecordFixture> = {}
  ): MedicalRecordFixture {
    return {
      record_id: `${this.patientPrefix}MR_${this.digits(10)}`,
      patient_id: patientId,
      provider_id: null,
      visit_date: toIsoDate(this.faker.date.recent({ days: 730 })),
      chief_complaint: this.faker.lorem.sentence(),
      diagnosis: this.faker.helpers.arrayElement(CONDITIONS),
      ...overrides,
    };
  }

  vitalSign(recordId: string, overrides: Partial<VitalSignFixture> = {}): VitalSignFixture {
    return {
      record_id: recordId,
      blood_pressure_systolic: this.faker.number.int({ min: 90, max: 180 }),
      blood_pressure_diastolic: this.faker.number.int({ min: 60, max: 110 }),
      heart_rate: this.faker.number.int({ min: 60, max: 100 }),
      temperature: this.faker.number.float({ min: 97, max: 101, fractionDigits: 1 }),
      ...overrides,
    };
  }

  medication(patientId: string, overrides: Partial<MedicationFixture> = {}): MedicationFixture {
    return {
      patient_id: patientId,
      medication_name: this.faker.helpers.arrayElement(MEDICATIONS),
      dosage: `${this.faker.helpers.arrayElement([5, 10, 20, 50])}mg`,
      frequency: this.faker.helpers.arrayElement(['Once daily', 'Twice daily', 'As needed']),
      start_date: toIsoDate(this.faker.date.recent({ days: 365 })),
      prescribed_by: null,
      ...overrides,
    };
  }

  allergy(patientId: string, overrides: Partial<AllergyFixture> = {}): AllergyFixture {
    return {
      patient_id: patientId,
      allergen: this.faker.helpers.arrayElement(ALLERGENS),
      reaction: this.faker.helpers.arrayElement(['Rash', 'Hives', 'Swelling', 'Anaphylaxis']),
      severity: this.faker.helpers.arrayElement(['MILD', 'MODERATE', 'SEVERE'] as const),
      ...overrides,
    };
  }

  appointment(
    patientId: string,
    providerId: string,
    overrides: Partial<AppointmentFixture> = {}
  ): AppointmentFixture {
    const hour = this.faker.number.int({ min: 8, max: 16 });
    return {
      appointment_id: `${this.patientPrefix}APT_${this.digits(8)}`,
      patient_id: patientId,
      provider_id: providerId,
      appointment_type: this.faker.helpers.arrayElement(APPOINTMENT_TYPES),
      appointment_date: toIsoDate(this.faker.date.soon({ days: 30 })),
      appointment_time: `${String(hour).padStart(2, '0')}:${this.faker.helpers.arrayElement(['00', '30'])}:00`,
      duration_minutes: this.faker.helpers.arrayElement([15, 30, 45, 60]),
      status: 'SCHEDULED',
      ...overrides,
    };
  }

  user(overrides: Partial<UserFixture> = {}): UserFixture {
    const suffix = this.digits(8);
    return {
      user_id: `${this.userPrefix}${suffix}`,
      username: `testuser_${suffix}`,
      email: `testuser_${suffix}@healthcare.test`,
      // Never a usable credential
      password_hash: `placeholder-${this.faker.string.alphanumeric(16)}`,
      first_name: this.faker.person.firstName(),
      last_name: this.faker.person.lastName(),
      role: this.faker.helpers.arrayElement(['DOCTOR', 'NURSE', 'RECEPTIONIST'] as const),
      provider_id: null,
      ...overrides,
    };
  }

  /**
   * An audit row as the application under test would write it
   */
  auditEvent(
    event: Pick<AuditEventFixture, 'patient_id' | 'user_id' | 'action'> &
      Partial<AuditEventFixture>
  ): AuditEventFixture {
    return {
      table_name: event.patient_id ? 'patients' : null,
      record_id: event.patient_id,
      old_values: null,
      new_values: null,
      // Somewhere in the last tenth of the default window
      created_date: new Date(
        Date.now() - this.faker.number.int({ max: DEFAULT_AUDIT_RECENCY_WINDOW_MS / 10 })
      ),
      ...event,
    };
  }
}
