import { Customer } from '../../domain/entities/customer.entity';

export interface CustomerRepository {
  findByEmail(email: string): Promise<Customer | null>;
  findByPhone(phone: string): Promise<Customer | null>;
  create(customer: Customer): Promise<Customer>;
}
