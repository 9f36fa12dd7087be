export {
  StudentAdapter,
  renderStudent,
  describeOutcome,
  describeListing,
  NO_STUDENTS_MESSAGE,
} from './student_adapter';
export type {
  IStudentAdapter,
  StudentAdapterDependencies,
  StudentOutcome,
  StudentListing,
} from './student_adapter.types';
