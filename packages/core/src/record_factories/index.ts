export { createStudentRecord } from './student_factory';
