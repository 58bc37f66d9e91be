export * from './common';
export * from './address';
export * from './person';
export * from './organization';
export * from './course';
