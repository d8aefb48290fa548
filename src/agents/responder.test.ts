import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';

import { buildResponderMessages, generateResponse } from './responder.js';
import { buildSystemPrompt, DEFAULT_DESTINATION, FALLBACK_RESPONSE } from './prompts.js';
import { ToolRegistry } from '../core/registry.js';
import { defineTool } from '../core/tool.js';
import { createTravelSearchTool } from '../tools/travel-search.js';
import { createWeatherTool } from '../tools/weather.js';
import { ScriptedModel, textReply, toolCallReply } from '../llm/testing.js';
import type { ChatMessage, ToolInvocation, ToolMessage } from '../llm/types.js';

const SEARCH_OUTPUT =
  '• Senso-ji\n  Oldest temple in the city.\n  Location: Asakusa | Category: temple\n';
const FORECAST = { city: { name: 'Tokyo' }, list: [{ weather: [{ main: 'Rain' }] }] };

function travelRegistry(): ToolRegistry {
  return new ToolRegistry([
    createTravelSearchTool({
      searcher: {
        search: async () => [
          {
            id: 'spot-1',
            title: 'Senso-ji',
            content: 'Oldest temple in the city.',
            area: 'Asakusa',
            category: 'temple',
          },
        ],
      },
    }),
    createWeatherTool({ client: { getForecast: async () => FORECAST } }),
  ]);
}

const searchCall: ToolInvocation = {
  id: 'call_search',
  name: 'search_travel_info',
  arguments: '{"query":"temples in Asakusa"}',
};
const weatherCall: ToolInvocation = {
  id: 'call_weather',
  name: 'get_weather_info',
  arguments: '{"location":"Tokyo"}',
};

function toolMessages(messages: readonly ChatMessage[]): ToolMessage[] {
  return messages.filter((m): m is ToolMessage => m.role === 'tool');
}

describe('buildResponderMessages', () => {
  it('puts the system prompt first and the input last, history in between', () => {
    const history: ChatMessage[] = [
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello!' },
    ];

    const messages = buildResponderMessages({
      userInput: 'Any temples?',
      intent: 'travel_info',
      conversationHistory: history,
    });

    assert.strictEqual(messages.length, 4);
    assert.strictEqual(messages[0]?.role, 'system');
    assert.deepStrictEqual(messages.slice(1, 3), history);
    assert.deepStrictEqual(messages[3], { role: 'user', content: 'Any temples?' });
  });

  it('leaves the hint blank for an unknown intent', () => {
    const messages = buildResponderMessages({
      userInput: 'Hi',
      intent: 'unclear',
      conversationHistory: [],
    });
    assert.deepStrictEqual(messages[0], {
      role: 'system',
      content: buildSystemPrompt(DEFAULT_DESTINATION, ''),
    });
  });
});

describe('generateResponse', () => {
  it('answers small talk in a single round', async () => {
    const model = new ScriptedModel([textReply('Hello! Planning a trip to Tokyo?')]);

    const answer = await generateResponse(
      { model, registry: travelRegistry() },
      { userInput: 'Hi there', intent: 'small_talk', conversationHistory: [] }
    );

    assert.strictEqual(answer, 'Hello! Planning a trip to Tokyo?');
    assert.strictEqual(model.requests.length, 1);
    assert.strictEqual(model.requests[0]?.toolChoice, 'auto');
    assert.deepStrictEqual(
      model.requests[0]?.tools?.map((tool) => tool.name),
      ['search_travel_info', 'get_weather_info']
    );
  });

  it('runs both tools for a mixed question and answers in round two', async () => {
    const model = new ScriptedModel([
      toolCallReply([searchCall, weatherCall]),
      textReply('Visit Senso-ji, and bring an umbrella.'),
    ]);

    const answer = await generateResponse(
      { model, registry: travelRegistry() },
      {
        userInput: 'What temples are in Asakusa and will it rain tomorrow?',
        intent: 'mixed',
        conversationHistory: [],
      }
    );

    assert.strictEqual(answer, 'Visit Senso-ji, and bring an umbrella.');
    assert.strictEqual(model.requests.length, 2);

    const second = model.requests[1];
    assert.strictEqual(second?.tools, undefined);
    assert.deepStrictEqual(second?.messages.slice(2), [
      { role: 'assistant', content: '', toolCalls: [searchCall, weatherCall] },
      {
        role: 'tool',
        content: SEARCH_OUTPUT,
        toolCallId: 'call_search',
        toolName: 'search_travel_info',
      },
      {
        role: 'tool',
        content: JSON.stringify(FORECAST, null, 2),
        toolCallId: 'call_weather',
        toolName: 'get_weather_info',
      },
    ]);
  });

  it('gives the second round the same tool results whatever the call order', async () => {
    const forward = new ScriptedModel([toolCallReply([searchCall, weatherCall]), textReply('ok')]);
    const backward = new ScriptedModel([toolCallReply([weatherCall, searchCall]), textReply('ok')]);
    const input = { userInput: 'Temples and rain?', intent: 'mixed', conversationHistory: [] };

    await generateResponse({ model: forward, registry: travelRegistry() }, input);
    await generateResponse({ model: backward, registry: travelRegistry() }, input);

    const byId = (a: ToolMessage, b: ToolMessage) => a.toolCallId.localeCompare(b.toolCallId);
    const forwardResults = toolMessages(forward.requests[1]?.messages ?? []).sort(byId);
    const backwardResults = toolMessages(backward.requests[1]?.messages ?? []).sort(byId);

    assert.strictEqual(forwardResults.length, 2);
    assert.deepStrictEqual(forwardResults, backwardResults);
  });

  it('runs tool calls one after another', async () => {
    const events: string[] = [];
    const slowTool = (id: string) =>
      defineTool({ id, description: id, inputSchema: z.object({}) }, async () => {
        events.push(`${id}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`${id}:end`);
        return id;
      });
    const model = new ScriptedModel([
      toolCallReply([
        { id: 'c1', name: 'first', arguments: '{}' },
        { id: 'c2', name: 'second', arguments: '{}' },
      ]),
      textReply('done'),
    ]);

    await generateResponse(
      { model, registry: new ToolRegistry([slowTool('first'), slowTool('second')]) },
      { userInput: 'go', intent: '', conversationHistory: [] }
    );

    assert.deepStrictEqual(events, ['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('answers an unregistered tool call with the placeholder result', async () => {
    const model = new ScriptedModel([
      toolCallReply([{ id: 'c1', name: 'book_hotel', arguments: '{}' }]),
      textReply('I cannot book hotels.'),
    ]);

    const answer = await generateResponse(
      { model, registry: travelRegistry() },
      { userInput: 'Book me a hotel', intent: 'small_talk', conversationHistory: [] }
    );

    assert.strictEqual(answer, 'I cannot book hotels.');
    assert.deepStrictEqual(toolMessages(model.requests[1]?.messages ?? []), [
      { role: 'tool', content: 'Unknown function', toolCallId: 'c1', toolName: 'book_hotel' },
    ]);
  });

  it('falls back when the first round fails', async () => {
    const model = new ScriptedModel([new Error('rate limited')]);
    const answer = await generateResponse(
      { model, registry: travelRegistry() },
      { userInput: 'Hi', intent: 'small_talk', conversationHistory: [] }
    );
    assert.strictEqual(answer, FALLBACK_RESPONSE);
  });

  it('falls back when the second round fails', async () => {
    const model = new ScriptedModel([toolCallReply([searchCall]), new Error('timeout')]);
    const answer = await generateResponse(
      { model, registry: travelRegistry() },
      { userInput: 'Temples?', intent: 'travel_info', conversationHistory: [] }
    );
    assert.strictEqual(answer, FALLBACK_RESPONSE);
  });

  it('falls back on malformed tool arguments', async () => {
    const model = new ScriptedModel([
      toolCallReply([{ id: 'c1', name: 'search_travel_info', arguments: '{"query":' }]),
      textReply('never reached'),
    ]);

    const answer = await generateResponse(
      { model, registry: travelRegistry() },
      { userInput: 'Temples?', intent: 'travel_info', conversationHistory: [] }
    );

    assert.strictEqual(answer, FALLBACK_RESPONSE);
    assert.strictEqual(model.remaining, 1);
  });

  it('falls back when the model answers with nothing', async () => {
    const model = new ScriptedModel([textReply('   ')]);
    const answer = await generateResponse(
      { model, registry: travelRegistry() },
      { userInput: 'Hi', intent: 'small_talk', conversationHistory: [] }
    );
    assert.strictEqual(answer, FALLBACK_RESPONSE);
  });
});
