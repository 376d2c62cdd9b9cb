import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { KnowledgeService } from '../../src/knowledge/knowledge-service';

const FAQ = `
- question: How do I update my mailing address?
  answer: Open Profile and edit the address.
  tags: [address, profile]
  category: account
`;

const POLICIES = `
- id: refunds
  title: Refund policy
  content: Refunds are issued within 10 days.
`;

describe('KnowledgeService', () => {
  let dir: string;

  function write(files: Record<string, string>): void {
    for (const [name, content] of Object.entries(files)) {
      fs.writeFileSync(path.join(dir, name), content);
    }
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'knowledge-'));
    write({
      'faq.yaml': FAQ,
      'policies.yaml': POLICIES,
      'stop-words.json': JSON.stringify(['how', 'do', 'my', 'the']),
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should score FAQ matches with extra weight on tags', async () => {
    const results = await new KnowledgeService(dir).search('How do I update my mailing address?');

    expect(results).toEqual([
      {
        type: 'faq',
        content: 'Q: How do I update my mailing address?\nA: Open Profile and edit the address.',
        score: 3.5 / 3,
        source: 'faq/account',
      },
    ]);
  });

  it('should search policies', async () => {
    const results = await new KnowledgeService(dir).search('refund');
    expect(results).toEqual([
      { type: 'policy', content: 'Policy: Refund policy\nRefunds are issued within 10 days.', score: 1, source: 'policy/refunds' },
    ]);
  });

  it('should order by score and apply the limit', async () => {
    const service = new KnowledgeService(dir);

    const both = await service.search('address refund');
    expect(both.map((r) => [r.source, r.score])).toEqual([
      ['faq/account', 0.75],
      ['policy/refunds', 0.5],
    ]);
    expect(await service.search('address refund', 1)).toHaveLength(1);
  });

  it('should return nothing when no entry scores above the threshold', async () => {
    expect(await new KnowledgeService(dir).search('weather forecast tomorrow')).toEqual([]);
  });

  it('should ignore a file with the wrong shape', async () => {
    write({ 'faq.yaml': 'just a sentence' });
    const service = new KnowledgeService(dir);

    expect(await service.search('mailing address')).toEqual([]);
    expect(await service.search('refund')).toHaveLength(1);
  });

  it('should start empty when the directory has no files', async () => {
    const service = new KnowledgeService(path.join(dir, 'nowhere'));
    expect(await service.search('address')).toEqual([]);
  });

  it('should load the shipped knowledge base', async () => {
    const results = await new KnowledgeService().search('password reset');
    expect(results.length).toBeGreaterThan(0);
  });

  describe('document management', () => {
    const warranty = { id: 'warranty', title: 'Warranty terms', content: 'Devices carry a two year warranty.' };

    it('should make an added document searchable', async () => {
      const service = new KnowledgeService(dir);

      expect(await service.addDocument(warranty)).toBe(true);
      expect(await service.search('warranty')).toEqual([
        { type: 'policy', content: 'Policy: Warranty terms\nDevices carry a two year warranty.', score: 1, source: 'policy/warranty' },
      ]);
    });

    it('should refuse to add a document whose id is taken', async () => {
      const service = new KnowledgeService(dir);

      expect(await service.addDocument({ ...warranty, id: 'refunds' })).toBe(false);
      const [refunds] = await service.search('refund');
      expect(refunds.content).toBe('Policy: Refund policy\nRefunds are issued within 10 days.');
    });

    it('should update only the fields given', async () => {
      const service = new KnowledgeService(dir);

      const updated = await service.updateDocument('refunds', { content: 'Refunds are issued within 5 days.' });

      expect(updated).toEqual({ id: 'refunds', title: 'Refund policy', content: 'Refunds are issued within 5 days.' });
      const [refunds] = await service.search('refund');
      expect(refunds.content).toBe('Policy: Refund policy\nRefunds are issued within 5 days.');
      expect(await service.updateDocument('missing', { title: 'x' })).toBeNull();
    });

    it('should delete a document', async () => {
      const service = new KnowledgeService(dir);

      expect(await service.deleteDocument('refunds')).toBe(true);
      expect(await service.deleteDocument('refunds')).toBe(false);
      expect(await service.search('refund')).toEqual([]);
    });

    it('should report counts and drop runtime changes on reload', async () => {
      const service = new KnowledgeService(dir);
      await service.addDocument(warranty);

      expect(await service.stats()).toEqual({ faqCount: 1, documentCount: 2, stopWordCount: 4 });

      service.loadAll();
      expect(await service.stats()).toEqual({ faqCount: 1, documentCount: 1, stopWordCount: 4 });
    });
  });
});
