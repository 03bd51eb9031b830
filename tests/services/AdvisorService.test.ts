import { describe, it, expect } from 'vitest';
import { UpstreamError, ValidationError } from '../../src/errors.js';
import { createTestHarness } from '../mocks/testContainer.js';

describe('AdvisorService', () => {
  it('should answer from retrieved policy context', async () => {
    const { container, generation } = createTestHarness();
    await container.ingestionService.ingest({
      source: 'home-policy.pdf',
      text: 'Section 2 covers sudden and accidental water damage from burst pipes, excluding gradual leaks.',
    });
    generation.reply('Burst pipes are covered under Section 2.');

    const result = await container.advisorService.ask('  Are burst pipes covered?  ');

    expect(result).toEqual({
      answer: 'Burst pipes are covered under Section 2.',
      contextAvailable: true,
    });
    expect(generation.calls[0].prompt).toContain('Section 2 covers sudden and accidental water damage');
    expect(generation.calls[0].prompt).toContain('CUSTOMER QUESTION:\nAre burst pipes covered?');
  });

  it('should still answer without policy context', async () => {
    const { container, generation } = createTestHarness();
    generation.reply('It depends on your policy terms.');

    const result = await container.advisorService.ask('Is flood covered?');

    expect(result.contextAvailable).toBe(false);
    expect(generation.calls[0].prompt).toContain('No policy document on file.');
  });

  it('should carry on when retrieval fails', async () => {
    const { container, chunks, logger } = createTestHarness();
    chunks.searchError = new Error('vector store offline');

    const result = await container.advisorService.ask('Is flood covered?');

    expect(result.contextAvailable).toBe(false);
    expect(logger.events).toContainEqual(
      expect.objectContaining({
        level: 'warn',
        message: 'Policy context retrieval failed',
        fields: { component: 'retrieval', error: 'vector store offline' },
      })
    );
  });

  it('should reject a blank question', async () => {
    const { container } = createTestHarness();
    await expect(container.advisorService.ask('   ')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should raise an UpstreamError when generation fails', async () => {
    const { container, generation } = createTestHarness();
    generation.always(new Error('model overloaded'));

    await expect(container.advisorService.ask('Is flood covered?')).rejects.toBeInstanceOf(
      UpstreamError
    );
  });
});
