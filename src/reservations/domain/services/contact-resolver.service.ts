import { Injectable } from '@nestjs/common';
import { createHash } from 'crypto';

export interface CustomerContact {
  name: string;
  email: string | null;
  phone: string | null;
  notes: string;
}

@Injectable()
export class ContactResolverService {
  /**
   * Fills in a contact channel for small walk-in style parties.
   *
   * When neither email nor phone is given and the party is smaller than
   * `placeholderPartyLimit`, a placeholder email derived from the name is used.
   * The same name always yields the same address, so repeat guests are matched
   * to one customer record. Larger parties get no placeholder and come back
   * without a channel; the caller rejects them.
   *
   * Note: two different guests sharing a name share the placeholder and
   * therefore the customer record.
   */
  resolve(
    contact: CustomerContact,
    partySize: number,
    placeholderPartyLimit: number,
  ): CustomerContact {
    if (contact.email || contact.phone) {
      return contact;
    }
    if (partySize >= placeholderPartyLimit) {
      return contact;
    }
    return { ...contact, email: this.placeholderEmail(contact.name) };
  }

  hasContactChannel(contact: CustomerContact): boolean {
    return Boolean(contact.email || contact.phone);
  }

  placeholderEmail(name: string): string {
    const digest = createHash('md5')
      .update(name.trim().toLowerCase())
      .digest('hex');
    return `guest-${digest.substring(0, 8)}@restaurant.local`;
  }
}
