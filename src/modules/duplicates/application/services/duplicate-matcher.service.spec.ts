import type { ContactSearchPort } from '@/modules/duplicates/application/ports/contact-search.port';
import type { DealSearchPort } from '@/modules/duplicates/application/ports/deal-search.port';
import type { DirectorySearchPort } from '@/modules/duplicates/application/ports/directory-search.port';
import {
  buildContact,
  buildDeal,
  buildLead,
  buildListing,
  fixedScorer,
} from '@/testing/fixtures';

import { DuplicateMatcherService } from './duplicate-matcher.service';

function mockPorts() {
  const contacts: jest.Mocked<ContactSearchPort> = {
    findByEmail: jest.fn().mockResolvedValue([]),
    findByPhone: jest.fn().mockResolvedValue([]),
    findByName: jest.fn().mockResolvedValue([]),
  };
  const deals: jest.Mocked<DealSearchPort> = {
    findByPropertyName: jest.fn().mockResolvedValue([]),
  };
  const directory: jest.Mocked<DirectorySearchPort> = {
    findByPropertyName: jest.fn().mockResolvedValue([]),
  };
  return { contacts, deals, directory };
}

describe('DuplicateMatcherService', () => {
  describe('matchContact', () => {
    it('stops at the email lookup when it finds a contact', async () => {
      const { contacts, deals, directory } = mockPorts();
      const found = buildContact({ externalId: '501', email: 'ana@example.com' });
      contacts.findByEmail.mockResolvedValue([found, buildContact({ externalId: '502' })]);
      const matcher = new DuplicateMatcherService(contacts, deals, directory, fixedScorer({}));

      const result = await matcher.matchContact(
        buildLead({ email: ' ana@example.com ', phone: '+1 650 253 0000', firstName: 'Ana' }),
      );

      expect(result).toEqual({ found: true, candidate: found, matchType: 'email' });
      expect(contacts.findByEmail).toHaveBeenCalledWith('ana@example.com');
      expect(contacts.findByPhone).not.toHaveBeenCalled();
      expect(contacts.findByName).not.toHaveBeenCalled();
    });

    it('skips the email lookup for the "nan" placeholder and searches by E.164 phone', async () => {
      const { contacts, deals, directory } = mockPorts();
      const found = buildContact({ externalId: '777', phone: '+16502530000' });
      contacts.findByPhone.mockResolvedValue([found]);
      const matcher = new DuplicateMatcherService(contacts, deals, directory, fixedScorer({}));

      const result = await matcher.matchContact(
        buildLead({ email: 'nan', phone: '(650) 253-0000', countryCode: 'us' }),
      );

      expect(contacts.findByEmail).not.toHaveBeenCalled();
      expect(contacts.findByPhone).toHaveBeenCalledWith('+16502530000');
      expect(result).toEqual({ found: true, candidate: found, matchType: 'phone' });
    });

    it('skips the phone lookup when the number does not normalize', async () => {
      const { contacts, deals, directory } = mockPorts();
      const matcher = new DuplicateMatcherService(contacts, deals, directory, fixedScorer({}));

      const result = await matcher.matchContact(buildLead({ email: 'ana@example.com', phone: '12345' }));

      expect(result).toEqual({ found: false });
      expect(contacts.findByEmail).toHaveBeenCalledTimes(1);
      expect(contacts.findByPhone).not.toHaveBeenCalled();
      expect(contacts.findByName).not.toHaveBeenCalled();
    });

    it('accepts the first name candidate with either part at or above 80', async () => {
      const { contacts, deals, directory } = mockPorts();
      const near = buildContact({ externalId: '1', firstName: 'Jonny', lastName: 'Roe' });
      const match = buildContact({ externalId: '2', firstName: 'John', lastName: 'Smith' });
      const later = buildContact({ externalId: '3', firstName: 'Jon', lastName: 'Doe' });
      contacts.findByName.mockResolvedValue([near, match, later]);
      const scorer = fixedScorer({
        'name:Jon|Jonny': 79,
        'name:Doe|Roe': 79,
        'name:Jon|John': 81,
        'name:Doe|Smith': 10,
        'name:Jon|Jon': 100,
        'name:Doe|Doe': 100,
      });
      const matcher = new DuplicateMatcherService(contacts, deals, directory, scorer);

      const result = await matcher.matchContact(buildLead({ firstName: ' Jon ', lastName: 'Doe' }));

      expect(contacts.findByName).toHaveBeenCalledWith({ firstName: 'Jon', lastName: 'Doe' });
      expect(result).toEqual({ found: true, candidate: match, matchType: 'name', score: 81 });
      expect(scorer.calls).toHaveLength(4);
    });

    it('rejects name candidates where both parts score below 80', async () => {
      const { contacts, deals, directory } = mockPorts();
      contacts.findByName.mockResolvedValue([buildContact({ firstName: 'Jonny', lastName: 'Roe' })]);
      const scorer = fixedScorer({ 'name:Jon|Jonny': 79, 'name:Doe|Roe': 79 });
      const matcher = new DuplicateMatcherService(contacts, deals, directory, scorer);

      const result = await matcher.matchContact(buildLead({ firstName: 'Jon', lastName: 'Doe' }));

      expect(result).toEqual({ found: false });
    });

    it('sends only the name parts the lead has and scores a missing part as 0', async () => {
      const { contacts, deals, directory } = mockPorts();
      const candidate = buildContact({ firstName: null, lastName: 'Souza' });
      contacts.findByName.mockResolvedValue([candidate]);
      const scorer = fixedScorer({ 'name:Souza|Souza': 100 });
      const matcher = new DuplicateMatcherService(contacts, deals, directory, scorer);

      const result = await matcher.matchContact(buildLead({ firstName: '  ', lastName: 'Souza' }));

      expect(contacts.findByName).toHaveBeenCalledWith({ lastName: 'Souza' });
      expect(scorer.calls).toEqual([['Souza', 'Souza', 'name']]);
      expect(result).toEqual({ found: true, candidate, matchType: 'name', score: 100 });
    });

    it('does not search by name when the lead has no name', async () => {
      const { contacts, deals, directory } = mockPorts();
      const matcher = new DuplicateMatcherService(contacts, deals, directory, fixedScorer({}));

      await expect(matcher.matchContact(buildLead())).resolves.toEqual({ found: false });
      expect(contacts.findByEmail).not.toHaveBeenCalled();
      expect(contacts.findByPhone).not.toHaveBeenCalled();
      expect(contacts.findByName).not.toHaveBeenCalled();
    });
  });

  describe('matchDeal', () => {
    it('picks the best deal at or above 70 and passes the locality along', async () => {
      const { contacts, deals, directory } = mockPorts();
      const below = buildDeal({ externalId: 'd1', name: 'Casa Azul Hostel' });
      const best = buildDeal({ externalId: 'd2', name: 'Casa Azul' });
      const unnamed = buildDeal({ externalId: 'd3', name: null });
      deals.findByPropertyName.mockResolvedValue([below, best, unnamed]);
      const scorer = fixedScorer({
        'property:Casa Azul|Casa Azul Hostel': 69,
        'property:Casa Azul|Casa Azul': 70,
      });
      const matcher = new DuplicateMatcherService(contacts, deals, directory, scorer);

      const result = await matcher.matchDeal(buildLead({ propertyName: 'Casa Azul', locality: 'Lisboa' }));

      expect(deals.findByPropertyName).toHaveBeenCalledWith('Casa Azul', 'Lisboa');
      expect(result).toEqual({ found: true, candidate: best, matchType: 'deal', score: 70 });
      expect(scorer.calls).toHaveLength(2);
    });

    it('reports no deal when every candidate scores below 70', async () => {
      const { contacts, deals, directory } = mockPorts();
      deals.findByPropertyName.mockResolvedValue([buildDeal({ name: 'Casa Verde' })]);
      const scorer = fixedScorer({ 'property:Casa Azul|Casa Verde': 69 });
      const matcher = new DuplicateMatcherService(contacts, deals, directory, scorer);

      await expect(matcher.matchDeal(buildLead({ propertyName: 'Casa Azul' }))).resolves.toEqual({
        found: false,
      });
    });

    it('does not search deals without a property name', async () => {
      const { contacts, deals, directory } = mockPorts();
      const matcher = new DuplicateMatcherService(contacts, deals, directory, fixedScorer({}));

      await expect(matcher.matchDeal(buildLead({ propertyName: 'nan' }))).resolves.toEqual({
        found: false,
      });
      expect(deals.findByPropertyName).not.toHaveBeenCalled();
    });
  });

  describe('matchDirectory', () => {
    it('matches a listing the same way as deals', async () => {
      const { contacts, deals, directory } = mockPorts();
      const listing = buildListing({ externalId: 'recX', name: 'Casa Azul' });
      directory.findByPropertyName.mockResolvedValue([listing]);
      const scorer = fixedScorer({ 'property:Casa Azul|Casa Azul': 100 });
      const matcher = new DuplicateMatcherService(contacts, deals, directory, scorer);

      const result = await matcher.matchDirectory(buildLead({ propertyName: 'Casa Azul' }));

      expect(directory.findByPropertyName).toHaveBeenCalledWith('Casa Azul', null);
      expect(result).toEqual({ found: true, candidate: listing, matchType: 'directory', score: 100 });
    });

    it('reports no listing when the directory is not configured', async () => {
      const { contacts, deals } = mockPorts();
      const matcher = new DuplicateMatcherService(contacts, deals, null, fixedScorer({}));

      await expect(matcher.matchDirectory(buildLead({ propertyName: 'Casa Azul' }))).resolves.toEqual({
        found: false,
      });
    });
  });

  describe('matchLead', () => {
    it('returns the outcome of every category', async () => {
      const { contacts, deals, directory } = mockPorts();
      const contact = buildContact({ externalId: 'c1' });
      const listing = buildListing({ externalId: 'rec1', name: 'Casa Azul' });
      contacts.findByEmail.mockResolvedValue([contact]);
      directory.findByPropertyName.mockResolvedValue([listing]);
      const scorer = fixedScorer({ 'property:Casa Azul|Casa Azul': 100 });
      const matcher = new DuplicateMatcherService(contacts, deals, directory, scorer);

      const matches = await matcher.matchLead(
        buildLead({ email: 'ana@example.com', propertyName: 'Casa Azul' }),
      );

      expect(matches).toEqual({
        contact: { found: true, candidate: contact, matchType: 'email' },
        deal: { found: false },
        directory: { found: true, candidate: listing, matchType: 'directory', score: 100 },
      });
      expect(deals.findByPropertyName).toHaveBeenCalledTimes(1);
    });
  });
});
