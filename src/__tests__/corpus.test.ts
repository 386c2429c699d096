import { describe, expect, it } from 'vitest';

import { RoutingCorpus } from '../tasks/corpus';

describe('RoutingCorpus', () => {
  it('keeps only the most recent queries', () => {
    const corpus = new RoutingCorpus({ historyLimit: 2 });

    corpus.recordQuery('first', 'analysis', 1);
    corpus.recordQuery('second', 'interview', 2);
    corpus.recordQuery('third', 'job_fit', 3);

    expect(corpus.queryHistory()).toEqual([
      { query: 'second', task: 'interview', at: 2 },
      { query: 'third', task: 'job_fit', at: 3 },
    ]);
  });

  it('records nothing when the history limit is zero', () => {
    const corpus = new RoutingCorpus({ historyLimit: 0 });

    corpus.recordQuery('ignored', 'analysis');

    expect(corpus.queryHistory()).toHaveLength(0);
  });

  it('lists blurbs, inputs and history as documents', () => {
    const corpus = new RoutingCorpus();
    corpus.ingest({ resume: 'resume text', jobDescription: 'job text' });
    corpus.recordQuery('what now?', 'analysis');

    const docs = corpus.documents();

    expect(Array.from(docs.keys())).toEqual([
      'task:analysis',
      'task:interview',
      'task:suggestions',
      'task:job_fit',
      'resume',
      'job_description',
      'query:0',
    ]);
    expect(docs.get('resume')).toBe('resume text');
    expect(docs.get('query:0')).toBe('what now?');
  });

  it('replaces only the inputs that are given', () => {
    const corpus = new RoutingCorpus();
    corpus.ingest({ resume: 'old resume', jobDescription: 'job text' });

    corpus.ingest({ resume: 'new resume' });

    expect(corpus.resume).toBe('new resume');
    expect(corpus.jobDescription).toBe('job text');
  });

  it('reset clears inputs and history but keeps the blurbs', () => {
    const corpus = new RoutingCorpus();
    corpus.ingest({ resume: 'resume text', jobDescription: 'job text' });
    corpus.recordQuery('question', 'interview');

    corpus.reset();

    expect(corpus.resume).toBe('');
    expect(corpus.queryHistory()).toHaveLength(0);
    expect(corpus.documents().size).toBe(4);
  });
});
