import { CustomerMatcher, nameSimilarity } from '../services/customerMatcher';
import { ChannelUser } from '../types';
import { InMemoryRepositories, createInMemoryRepositories } from './helpers/inMemoryRepositories';

describe('nameSimilarity', () => {
  it('should compare lower-cased word sets', () => {
    expect(nameSimilarity('Ana Lima', 'ana lima')).toBe(1);
    expect(nameSimilarity('Ana Lima', 'Ana Souza')).toBeCloseTo(1 / 3);
    expect(nameSimilarity('Ana Maria Lima', 'Ana Lima')).toBeCloseTo(2 / 3);
  });

  it('should score empty names as no match', () => {
    expect(nameSimilarity('', 'Ana')).toBe(0);
    expect(nameSimilarity('   ', '   ')).toBe(0);
  });
});

describe('CustomerMatcher', () => {
  let repos: InMemoryRepositories;
  let matcher: CustomerMatcher;

  const channelUser = async (platformUserId: string, profile: Partial<ChannelUser> = {}): Promise<ChannelUser> => {
    const { user } = await repos.users.findOrCreate('account-1', platformUserId);
    const updated = await repos.users.updateProfile(user.id, {
      username: profile.username ?? '',
      name: profile.name ?? '',
      profilePictureUrl: '',
    });
    return updated ?? user;
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    repos = createInMemoryRepositories();
    matcher = new CustomerMatcher(repos.customers, repos.users);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should reuse a linked customer', async () => {
    const customer = repos.customers.add({ firstName: 'Ana', lastName: 'Lima', source: 'facebook' });
    const user = await channelUser('igsid-1', { name: 'Someone Else' });
    await repos.users.linkCustomer(user.id, customer.id);

    const matched = await matcher.matchOrLink({ ...user, customerId: customer.id }, 'instagram');

    expect(matched.id).toBe(customer.id);
    expect(repos.customers.rows.size).toBe(1);
  });

  it('should link to a customer whose name matches closely', async () => {
    const customer = repos.customers.add({ firstName: 'Ana', lastName: 'Lima', source: 'facebook' });
    repos.customers.add({ firstName: 'Ana', lastName: 'Souza', source: 'facebook' });
    const user = await channelUser('igsid-1', { name: 'ana LIMA' });

    const matched = await matcher.matchOrLink(user, 'instagram');

    expect(matched.id).toBe(customer.id);
    expect(repos.users.get(user.id).customerId).toBe(customer.id);
  });

  it('should create a customer when no name is close enough', async () => {
    repos.customers.add({ firstName: 'Ana', lastName: 'Souza', source: 'facebook' });
    const user = await channelUser('igsid-1', { name: 'Ana Maria Lima' });

    const created = await matcher.matchOrLink(user, 'instagram');

    expect(created).toMatchObject({ firstName: 'Ana', lastName: 'Maria Lima', source: 'instagram' });
    expect(repos.users.get(user.id).customerId).toBe(created.id);
  });

  it('should name customers after the username or the channel when the profile has no name', async () => {
    const withUsername = await channelUser('igsid-1', { username: 'ana.lima' });
    const anonymous = await channelUser('15550001111222');

    expect(await matcher.matchOrLink(withUsername, 'instagram')).toMatchObject({ firstName: 'ana.lima', lastName: '' });
    expect(await matcher.matchOrLink(anonymous, 'whatsapp')).toMatchObject({
      firstName: 'WhatsApp User 15550001',
      lastName: '',
      source: 'whatsapp',
    });
  });

  it('should drop a link to a removed customer and match again', async () => {
    const user = await channelUser('igsid-1', { name: 'Ana Lima' });
    await repos.users.linkCustomer(user.id, 'customer-removed');

    const customer = await matcher.matchOrLink({ ...user, customerId: 'customer-removed' }, 'instagram');

    expect(customer).toMatchObject({ firstName: 'Ana', lastName: 'Lima' });
    expect(repos.users.get(user.id).customerId).toBe(customer.id);
  });
});
