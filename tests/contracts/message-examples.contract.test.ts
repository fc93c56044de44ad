import test from 'node:test';
import assert from 'node:assert/strict';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  MESSAGE_CATALOG,
  PIPELINE_QUEUES,
  decodeAnalysisResultMessage,
  decodeIntakeMessage,
  queueForMessage,
  type PipelineMessage,
} from '../../packages/shared/src';

function decodeExample(raw: string): PipelineMessage | undefined {
  const intake = decodeIntakeMessage(raw);
  if (intake.status === 'decoded') {
    return intake.message;
  }

  const result = decodeAnalysisResultMessage(raw);
  return result.status === 'decoded' ? result.message : undefined;
}

test('docs event examples decode and cover the whole message catalog', async () => {
  const examplesDir = path.join(process.cwd(), 'docs', 'events', 'examples');
  const files = (await readdir(examplesDir))
    .filter((file) => file.endsWith('.json'))
    .sort();

  const observedTypes = new Set<string>();

  for (const file of files) {
    const raw = await readFile(path.join(examplesDir, file), 'utf8');
    const message = decodeExample(raw);

    assert.ok(message, `${file} must decode as a pipeline message`);

    const catalogEntry = MESSAGE_CATALOG[message.event_type];
    assert.equal(queueForMessage(message), catalogEntry.queue, `${file} must travel on its catalog queue`);
    observedTypes.add(message.event_type);
  }

  assert.deepEqual(
    Array.from(observedTypes).sort(),
    Object.keys(MESSAGE_CATALOG).sort(),
    'docs/events/examples must contain one example for each message type',
  );
});

test('the catalog routes intake and results to separate queues', () => {
  assert.equal(MESSAGE_CATALOG.ReviewCreated.queue, PIPELINE_QUEUES.reviewCreated);
  assert.equal(MESSAGE_CATALOG.AnalysisStarted.queue, PIPELINE_QUEUES.analysisCompleted);
  assert.equal(MESSAGE_CATALOG.AnalysisCompleted.queue, PIPELINE_QUEUES.analysisCompleted);
});
