export * from './student_adapter';
