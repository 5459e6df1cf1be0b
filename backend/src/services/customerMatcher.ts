import { Channel, ChannelUser, Customer } from '../types';
import { ChannelUserRepository, CustomerRepository } from '../db/repositories';

const SIMILARITY_THRESHOLD = 0.7;
const CANDIDATE_LIMIT = 5;
const MIN_SEARCH_TOKEN_LENGTH = 3;

const CHANNEL_LABELS: Record<Channel, string> = {
  instagram: 'Instagram',
  facebook: 'Facebook',
  whatsapp: 'WhatsApp',
  email: 'Email',
};

const nameTokens = (name: string): string[] => name.toLowerCase().split(/\s+/).filter(Boolean);

/** Jaccard similarity of the two names' lower-cased word sets */
export const nameSimilarity = (a: string, b: string): number => {
  const left = new Set(nameTokens(a));
  const right = new Set(nameTokens(b));
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
};

/**
 * Links channel users to local customers: an existing link first, then a name
 * match against known customers, otherwise a new customer built from the profile.
 */
export class CustomerMatcher {
  constructor(
    private readonly customers: CustomerRepository,
    private readonly users: ChannelUserRepository
  ) {}

  async matchOrLink(user: ChannelUser, channel: Channel): Promise<Customer> {
    const linked = await this.findLinked(user);
    if (linked) {
      return linked;
    }

    const customer = (await this.matchByName(user)) ?? (await this.createFor(user, channel));
    await this.users.linkCustomer(user.id, customer.id);
    console.log(`[customers] Linked ${channel} user ${user.platformUserId} to customer ${customer.id}`);
    return customer;
  }

  private async findLinked(user: ChannelUser): Promise<Customer | null> {
    if (!user.customerId) {
      return null;
    }

    const customer = await this.customers.findById(user.customerId);
    if (!customer) {
      // The customer was removed; the weak link goes with it
      await this.users.linkCustomer(user.id, null);
    }
    return customer;
  }

  private async matchByName(user: ChannelUser): Promise<Customer | null> {
    if (!user.name.trim()) {
      return null;
    }

    const searchTokens = nameTokens(user.name).filter((token) => token.length >= MIN_SEARCH_TOKEN_LENGTH);
    const candidates = await this.customers.searchByNameTokens(searchTokens, CANDIDATE_LIMIT);

    let best: Customer | null = null;
    let bestScore = 0;
    for (const candidate of candidates) {
      const score = nameSimilarity(user.name, `${candidate.firstName} ${candidate.lastName}`);
      if (score > SIMILARITY_THRESHOLD && score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }

    if (best) {
      console.log(`[customers] Name match for ${user.platformUserId}: customer ${best.id} (score ${bestScore.toFixed(2)})`);
    }
    return best;
  }

  private async createFor(user: ChannelUser, channel: Channel): Promise<Customer> {
    const [first = '', ...rest] = user.name.trim().split(/\s+/).filter(Boolean);
    const firstName = first || user.username || `${CHANNEL_LABELS[channel]} User ${user.platformUserId.slice(0, 8)}`;

    return this.customers.create({
      firstName,
      lastName: first ? rest.join(' ') : '',
      source: channel,
    });
  }
}
