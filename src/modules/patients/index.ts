export {
  PatientRepository,
  formatPatientInfo,
  patientContext,
} from "./patient-repository";
