/**
 * backend/src/modules/customers/index.ts
 *
 * Public surface of the customers module.
 */

export { CustomerService } from './customer.service';
export { CustomerErrors } from './customer.errors';
export type { Customer, CustomerUpdateSet } from './customer.types';
export type { CustomerRepo } from './dal/customer.repo';
