import { defaultTableName, pluralStudly, pluralize, snakeCase } from '../src/core/pluralize';

describe('pluralize', () => {
  it('should apply the regular suffix rules', () => {
    expect(pluralize('post')).toBe('posts');
    expect(pluralize('category')).toBe('categories');
    expect(pluralize('status')).toBe('statuses');
    expect(pluralize('box')).toBe('boxes');
    expect(pluralize('day')).toBe('days');
  });

  it('should use irregular forms and keep the casing of the input', () => {
    expect(pluralize('person')).toBe('people');
    expect(pluralize('Person')).toBe('People');
    expect(pluralize('child')).toBe('children');
  });

  it('should leave uncountable words alone', () => {
    expect(pluralize('data')).toBe('data');
  });
});

describe('defaultTableName', () => {
  it('should pluralize only the last studly word', () => {
    expect(pluralStudly('UserProfile')).toBe('UserProfiles');
    expect(defaultTableName('UserProfile')).toBe('user_profiles');
  });

  it('should derive conventional table names', () => {
    expect(defaultTableName('User')).toBe('users');
    expect(defaultTableName('Person')).toBe('people');
    expect(defaultTableName('OrderStatus')).toBe('order_statuses');
  });

  it('should snake case studly names', () => {
    expect(snakeCase('OrderLineItems')).toBe('order_line_items');
    expect(snakeCase('posts')).toBe('posts');
  });
});
