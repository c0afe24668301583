import { describe, expect, it } from 'vitest';
import { extractRawMentions, routeMessage, uniqueNames } from '../../src/discord/mentions.js';

const BOT_ID = '111111111111111111';
const USER_ID = '222222222222222222';
const OTHER_ID = '333333333333333333';

describe('extractRawMentions', () => {
  it('returns user ids in order of appearance', () => {
    expect(extractRawMentions(`<@${OTHER_ID}> ask <@!${BOT_ID}> please`)).toEqual([OTHER_ID, BOT_ID]);
  });

  it('ignores role and channel mentions', () => {
    expect(extractRawMentions(`<@&${OTHER_ID}> in <#${OTHER_ID}>`)).toEqual([]);
  });

  it('skips ids too short to be snowflakes', () => {
    expect(extractRawMentions(`<@${BOT_ID}> <@12> <@!${OTHER_ID}>`)).toEqual([BOT_ID, OTHER_ID]);
  });

  it('returns nothing for plain text', () => {
    expect(extractRawMentions('no mentions here @everyone')).toEqual([]);
  });
});

describe('routeMessage', () => {
  it('ignores the bot itself', () => {
    expect(routeMessage({ authorId: BOT_ID, botId: BOT_ID, rawMentions: [BOT_ID] })).toBe('ignore');
  });

  it('ignores messages without mentions', () => {
    expect(routeMessage({ authorId: USER_ID, botId: BOT_ID, rawMentions: [] })).toBe('ignore');
  });

  it('infers when the bot is the first mention', () => {
    expect(routeMessage({ authorId: USER_ID, botId: BOT_ID, rawMentions: [BOT_ID, OTHER_ID] })).toBe('infer');
  });

  it('acknowledges a later mention of the bot', () => {
    expect(routeMessage({ authorId: USER_ID, botId: BOT_ID, rawMentions: [OTHER_ID, BOT_ID] })).toBe('acknowledge');
  });

  it('ignores messages mentioning only others', () => {
    expect(routeMessage({ authorId: USER_ID, botId: BOT_ID, rawMentions: [OTHER_ID] })).toBe('ignore');
  });
});

describe('uniqueNames', () => {
  it('drops empty values and duplicates, longest first', () => {
    expect(uniqueNames(['mime', null, 'Mime Bot', undefined, '', 'mime'])).toEqual(['Mime Bot', 'mime']);
  });
});
