import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  buildIntentPrompt,
  buildSystemPrompt,
  DEFAULT_DESTINATION,
  intentHint,
  isIntent,
  refusalMessage,
} from './prompts.js';

describe('intentHint', () => {
  it('points travel questions at the search tool', () => {
    assert.strictEqual(
      intentHint('travel_info'),
      "HINT: This appears to be a travel question - you'll likely need the search_travel_info tool."
    );
  });

  it('points mixed questions at both tools', () => {
    assert.strictEqual(
      intentHint('mixed'),
      "HINT: This query involves both travel and weather - you'll likely need BOTH search_travel_info and get_weather_info tools."
    );
  });

  it('uses the given tool names', () => {
    assert.strictEqual(
      intentHint('weather_info', { search: 'find_spots', weather: 'forecast' }),
      "HINT: This appears to be a weather question - you'll likely need the forecast tool."
    );
  });

  it('has no hint for unknown labels', () => {
    assert.strictEqual(intentHint('banana'), '');
    assert.strictEqual(intentHint(''), '');
  });
});

describe('isIntent', () => {
  it('accepts exactly the four labels', () => {
    assert.strictEqual(isIntent('small_talk'), true);
    assert.strictEqual(isIntent('Small_Talk'), false);
  });
});

describe('refusalMessage', () => {
  it('names the destination city', () => {
    assert.strictEqual(refusalMessage(DEFAULT_DESTINATION), 'I can only help you with Tokyo information.');
  });
});

describe('buildSystemPrompt', () => {
  it('embeds the place, the hint and the refusal line', () => {
    const prompt = buildSystemPrompt(DEFAULT_DESTINATION, 'HINT: test');

    assert.ok(
      prompt.startsWith(
        'You are a Tokyo travel assistant. You EXCLUSIVELY provide information about Tokyo, Japan. NO OTHER CITIES ALLOWED.\n\nHINT: test\n\n'
      )
    );
    assert.ok(
      prompt.includes(
        'If user asks about ANY other location = Respond: "I can only help you with Tokyo information."\n'
      )
    );
  });

  it('omits the country when none is set', () => {
    const prompt = buildSystemPrompt({ city: 'Kyoto' }, '');
    assert.ok(prompt.includes('information about Kyoto. NO OTHER CITIES ALLOWED.'));
  });
});

describe('buildIntentPrompt', () => {
  it('lists every label and asks for the bare name', () => {
    const prompt = buildIntentPrompt(DEFAULT_DESTINATION);

    assert.ok(prompt.startsWith('You are an intent classifier for a Tokyo travel assistant.'));
    for (const label of ['travel_info:', 'weather_info:', 'mixed:', 'small_talk:']) {
      assert.ok(prompt.includes(`- ${label}`), label);
    }
    assert.ok(prompt.endsWith('Respond with ONLY the category name (no explanation).'));
  });
});
