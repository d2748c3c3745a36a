import { AnswerEvaluator, ChallengeGenerator, parseEvaluation } from './challenge.js';
import { ContextRetriever } from './retriever.js';
import { GenerationError } from '../util/errors.js';
import { ChallengeItem } from '../types.js';
import { createStubGenerator, createTableEmbeddings } from '../__mocks__/embeddings.js';
import { makeCollection } from '../__mocks__/documents.js';

const collection = makeCollection(
  ['Alpha facts.', 'Beta facts.', 'Gamma facts.', 'Delta facts.'],
  [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [0, 0, 1, 0],
    [0, 0, 0, 1],
  ]
);

const embeddings = createTableEmbeddings({ 'What about delta?': [0, 0, 0.2, 1] }, [0, 0, 0, 0]);

function reply(questions: Array<{ question: string; chunks: unknown[] }>): string {
  return JSON.stringify({ questions });
}

describe('ChallengeGenerator', () => {
  const options = { questionCount: 3, sampleChunks: 8 };

  it('should build questions with validated supporting chunks', async () => {
    const generator = createStubGenerator(
      reply([
        { question: 'Why alpha?', chunks: [0, 1] },
        { question: 'How gamma?', chunks: [2, 99] },
        { question: 'What about delta?', chunks: ['x'] },
      ])
    );
    const challenge = new ChallengeGenerator(generator, new ContextRetriever(embeddings), options);

    const items = await challenge.generate(collection);

    expect(items).toEqual([
      {
        id: 'q1',
        question: 'Why alpha?',
        supportingChunks: [
          { index: 0, text: 'Alpha facts.' },
          { index: 1, text: 'Beta facts.' },
        ],
      },
      { id: 'q2', question: 'How gamma?', supportingChunks: [{ index: 2, text: 'Gamma facts.' }] },
      { id: 'q3', question: 'What about delta?', supportingChunks: [{ index: 3, text: 'Delta facts.' }] },
    ]);
    expect(generator.generate.mock.calls[0][0].json).toBe(true);
    expect(generator.generate.mock.calls[0][0].prompt).toContain('Write 3 unique');
  });

  it('should only accept references to sampled chunks', async () => {
    const generator = createStubGenerator(reply([{ question: 'Why alpha?', chunks: [0, 1] }]));
    const challenge = new ChallengeGenerator(generator, new ContextRetriever(embeddings), {
      questionCount: 3,
      sampleChunks: 2,
    });

    const items = await challenge.generate(collection);

    // Chunks 0 and 3 are sampled; chunk 1 was never shown to the model
    expect(items[0].supportingChunks).toEqual([{ index: 0, text: 'Alpha facts.' }]);
    expect(generator.generate.mock.calls[0][0].prompt).not.toContain('Beta facts.');
  });

  it('should cap the number of questions and skip duplicates and blanks', async () => {
    const generator = createStubGenerator(
      reply([
        { question: 'Q one?', chunks: [0] },
        { question: 'q ONE?', chunks: [1] },
        { question: '   ', chunks: [1] },
        { question: 'Q two?', chunks: [1] },
        { question: 'Q three?', chunks: [2] },
        { question: 'Q four?', chunks: [3] },
      ])
    );
    const challenge = new ChallengeGenerator(generator, new ContextRetriever(embeddings), options);

    const items = await challenge.generate(collection);

    expect(items.map((item) => item.question)).toEqual(['Q one?', 'Q two?', 'Q three?']);
    expect(items.map((item) => item.id)).toEqual(['q1', 'q2', 'q3']);
  });

  it('should fail when no questions come back', async () => {
    const challenge = new ChallengeGenerator(createStubGenerator(reply([])), new ContextRetriever(embeddings), options);

    await expect(challenge.generate(collection)).rejects.toThrow('No usable challenge questions were generated');
  });

  it('should fail on malformed JSON', async () => {
    const challenge = new ChallengeGenerator(
      createStubGenerator('Here are some questions!'),
      new ContextRetriever(embeddings),
      options
    );

    const promise = challenge.generate(collection);
    await expect(promise).rejects.toBeInstanceOf(GenerationError);
    await expect(promise).rejects.toThrow('Challenge questions could not be parsed: Invalid JSON');
  });

  it('should fail for an empty collection', async () => {
    const generator = createStubGenerator(reply([]));
    const challenge = new ChallengeGenerator(generator, new ContextRetriever(embeddings), options);

    await expect(challenge.generate(makeCollection([], []))).rejects.toThrow(
      'Document has no content to build questions from'
    );
    expect(generator.generate).not.toHaveBeenCalled();
  });
});

describe('parseEvaluation', () => {
  it('should read the verdict and justification', () => {
    expect(parseEvaluation('Evaluation: Partially Correct\nJustification: Misses the altitude detail.')).toEqual({
      verdict: 'partially_correct',
      feedback: 'Misses the altitude detail.',
    });
  });

  it('should distinguish incorrect from correct', () => {
    expect(parseEvaluation('Evaluation: Incorrect\nJustification: Wrong chunk.').verdict).toBe('incorrect');
    expect(parseEvaluation('Evaluation: Correct\nJustification: Matches.').verdict).toBe('correct');
    expect(parseEvaluation('Evaluation: Not correct\nJustification: Wrong year.').verdict).toBe('incorrect');
    expect(parseEvaluation('Evaluation: Not right\nJustification: Wrong year.').verdict).toBe('incorrect');
  });

  it('should tolerate markdown emphasis', () => {
    expect(parseEvaluation('**Evaluation:** Correct\n**Justification:** Matches chunk 0.')).toEqual({
      verdict: 'correct',
      feedback: 'Matches chunk 0.',
    });
  });

  it('should fall back to unknown with the whole reply as feedback', () => {
    expect(parseEvaluation('  I think so.  ')).toEqual({ verdict: 'unknown', feedback: 'I think so.' });
  });
});

describe('AnswerEvaluator', () => {
  const item: ChallengeItem = {
    id: 'q1',
    question: 'At what temperature does water boil at sea level?',
    supportingChunks: [{ index: 0, text: 'Water boils at 100°C at sea level.' }],
  };

  it('should grade against the supporting chunks and return them', async () => {
    const generator = createStubGenerator('Evaluation: Correct\nJustification: Chunk 0 states 100°C.');
    const evaluator = new AnswerEvaluator(generator);

    const result = await evaluator.evaluate(item, '100 degrees Celsius');

    expect(result).toEqual({
      questionId: 'q1',
      question: item.question,
      verdict: 'correct',
      feedback: 'Chunk 0 states 100°C.',
      supportingChunks: item.supportingChunks,
    });
    const prompt = generator.generate.mock.calls[0][0].prompt;
    expect(prompt).toContain("User's answer: 100 degrees Celsius");
    expect(prompt).toContain('[Chunk 0]\nWater boils at 100°C at sea level.');
  });
});
