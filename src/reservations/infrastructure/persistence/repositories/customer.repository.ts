import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Customer } from '../../../domain/entities/customer.entity';
import { CustomerRepository as ICustomerRepository } from '../../../ports/repositories/customer.repository.interface';

@Injectable()
export class CustomerRepository implements ICustomerRepository {
  constructor(
    @InjectRepository(Customer)
    private readonly repository: Repository<Customer>,
  ) {}

  async findByEmail(email: string): Promise<Customer | null> {
    return this.repository.findOne({ where: { email } });
  }

  async findByPhone(phone: string): Promise<Customer | null> {
    return this.repository.findOne({ where: { phone } });
  }

  async create(customer: Customer): Promise<Customer> {
    const newCustomer = this.repository.create(customer);
    return this.repository.save(newCustomer);
  }
}
