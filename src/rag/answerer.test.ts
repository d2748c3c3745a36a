import { QuestionAnswerer, NO_SUPPORT_JUSTIFICATION, formatJustification } from './answerer.js';
import { ContextRetriever } from './retriever.js';
import { INSUFFICIENT_CONTEXT_ANSWER, NOT_IN_DOCUMENT_ANSWER } from './prompts.js';
import { ConversationTurn } from '../types.js';
import { createStubGenerator, createTableEmbeddings } from '../__mocks__/embeddings.js';
import { SKY_AND_WATER, makeCollection } from '../__mocks__/documents.js';

const WATER_QUESTION = 'At what temperature does water boil?';
const FRANCE_QUESTION = 'What is the capital of France?';

function turn(question: string, answer: string): ConversationTurn {
  return { question, answer, status: 'answered', sources: [], askedAt: new Date() };
}

describe('QuestionAnswerer', () => {
  const embeddings = createTableEmbeddings({
    [SKY_AND_WATER]: [1, 0, 0],
    [WATER_QUESTION]: [0.9, 0.1, 0],
    [FRANCE_QUESTION]: [0, 0, 1],
  });
  const collection = makeCollection([SKY_AND_WATER], [[1, 0, 0]]);
  const options = { topK: 5, minScore: 0.3, maxHistoryTurns: 5 };

  it('should answer from the document with the supporting snippet', async () => {
    const generator = createStubGenerator('Water boils at 100°C at sea level.');
    const answerer = new QuestionAnswerer(new ContextRetriever(embeddings), generator, options);

    const result = await answerer.answer(WATER_QUESTION, collection, []);

    expect(result.status).toBe('answered');
    expect(result.answer).toContain('100°C');
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0].text).toContain('Water boils at 100°C at sea level.');
    expect(result.justification).toBe(
      'Supported by:\n[Chunk 0] "The sky is blue. Water boils at 100°C at sea level." (score 0.99)'
    );
    expect(generator.generate.mock.calls[0][0].prompt).toContain(`[Chunk 0]\n${SKY_AND_WATER}`);
  });

  it('should return the not-found answer without calling the generator', async () => {
    const generator = createStubGenerator('Paris');
    const answerer = new QuestionAnswerer(new ContextRetriever(embeddings), generator, options);

    const result = await answerer.answer(FRANCE_QUESTION, collection, []);

    expect(result).toEqual({
      status: 'not_found',
      answer: NOT_IN_DOCUMENT_ANSWER,
      justification: NO_SUPPORT_JUSTIFICATION,
      sources: [],
    });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('should report not found when the model finds the context insufficient', async () => {
    const generator = createStubGenerator(INSUFFICIENT_CONTEXT_ANSWER);
    const answerer = new QuestionAnswerer(new ContextRetriever(embeddings), generator, options);

    const result = await answerer.answer(WATER_QUESTION, collection, []);

    expect(result.status).toBe('not_found');
    expect(result.answer).toBe(INSUFFICIENT_CONTEXT_ANSWER);
    expect(result.sources).toEqual([]);
  });

  it('should include only the most recent turns in the prompt', async () => {
    const generator = createStubGenerator('Water boils at 100°C.');
    const answerer = new QuestionAnswerer(new ContextRetriever(embeddings), generator, { ...options, maxHistoryTurns: 1 });

    await answerer.answer(WATER_QUESTION, collection, [
      turn('What colour is the sky?', 'Blue.'),
      turn('And the sea?', 'Not mentioned.'),
    ]);

    const prompt = generator.generate.mock.calls[0][0].prompt;
    expect(prompt).toContain('User: And the sea?\nAssistant: Not mentioned.');
    expect(prompt).not.toContain('What colour is the sky?');
  });

  it('should omit history when disabled', async () => {
    const generator = createStubGenerator('Water boils at 100°C.');
    const answerer = new QuestionAnswerer(new ContextRetriever(embeddings), generator, { ...options, maxHistoryTurns: 0 });

    await answerer.answer(WATER_QUESTION, collection, [turn('What colour is the sky?', 'Blue.')]);

    expect(generator.generate.mock.calls[0][0].prompt).not.toContain('Previous conversation');
  });
});

describe('formatJustification', () => {
  it('should list each source without a score when none is known', () => {
    expect(formatJustification([{ index: 3, text: 'Some\n\ntext' }])).toBe('Supported by:\n[Chunk 3] "Some text"');
  });

  it('should explain when there are no sources', () => {
    expect(formatJustification([])).toBe(NO_SUPPORT_JUSTIFICATION);
  });
});
