import { DescribeVoicesCommand, PollyClient, Voice as PollyVoice } from '@aws-sdk/client-polly';
import { CatalogUnavailableError } from '../domain/errors';
import { VoiceCatalogService } from './voice-catalog.service';

const FIRST_PAGE: PollyVoice[] = [
  { Id: 'Matthew', Name: 'Matthew', LanguageCode: 'en-US', Gender: 'Male', SupportedEngines: ['neural', 'generative'] },
  { Id: 'Lea', Name: 'Léa', LanguageCode: 'fr-FR', LanguageName: 'French', SupportedEngines: ['neural'] },
  { Id: 'Joanna', Name: 'Joanna', LanguageCode: 'en-US', SupportedEngines: ['standard', 'neural', 'generative'] },
];
const SECOND_PAGE: PollyVoice[] = [
  { Id: 'Brian', Name: 'Brian', LanguageCode: 'en-GB', SupportedEngines: ['standard'] },
  { Id: 'Danielle', Name: 'Danielle', LanguageCode: 'en-US', SupportedEngines: ['long-form', 'neural'] },
  { Name: 'Orphan' },
];

describe('VoiceCatalogService', () => {
  let polly: PollyClient;
  let catalog: VoiceCatalogService;
  let tokens: Array<string | undefined>;

  beforeEach(() => {
    polly = new PollyClient({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    });
    catalog = new VoiceCatalogService(polly);
    tokens = [];
  });

  function servePages(pages: PollyVoice[][]) {
    return jest.spyOn(polly, 'send').mockImplementation(async (command: unknown) => {
      if (!(command instanceof DescribeVoicesCommand)) {
        throw new Error('unexpected command');
      }
      const token = command.input.NextToken;
      tokens.push(token);
      const page = token ? Number(token) : 0;
      return {
        Voices: pages[page],
        NextToken: page + 1 < pages.length ? String(page + 1) : undefined,
        $metadata: {},
      };
    });
  }

  it('follows pagination and maps every voice with a language', async () => {
    servePages([FIRST_PAGE, SECOND_PAGE]);

    const voices = await catalog.fetchAll();

    expect(tokens).toEqual([undefined, '1']);
    expect(voices.map((voice) => voice.id)).toEqual(['Matthew', 'Lea', 'Joanna', 'Brian', 'Danielle']);
    expect(voices[1]).toEqual({
      id: 'Lea',
      name: 'Léa',
      languageCode: 'fr-FR',
      languageName: 'French',
      gender: undefined,
      supportedTiers: ['neural'],
    });
    expect(voices[2].supportedTiers).toEqual(['neural', 'generative']);
    expect(voices[3].supportedTiers).toEqual([]);
  });

  it('fetches once and shares the result', async () => {
    const send = servePages([FIRST_PAGE]);

    const [first, second] = await Promise.all([catalog.fetchAll(), catalog.fetchAll()]);
    const third = await catalog.fetchAll();

    expect(send).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(third).toBe(first);
  });

  it('does not keep a failed fetch', async () => {
    const send = jest
      .spyOn(polly, 'send')
      .mockImplementationOnce(async () => {
        throw new Error('getaddrinfo ENOTFOUND polly.us-east-1.amazonaws.com');
      })
      .mockImplementationOnce(async () => ({ Voices: FIRST_PAGE, $metadata: {} }));

    await expect(catalog.fetchAll()).rejects.toThrow(
      new CatalogUnavailableError(new Error('getaddrinfo ENOTFOUND polly.us-east-1.amazonaws.com')),
    );
    await expect(catalog.fetchAll()).resolves.toHaveLength(3);
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('filters by language and quality and sorts by id', async () => {
    servePages([FIRST_PAGE, SECOND_PAGE]);

    await expect(catalog.filter('en-US', 'neural')).resolves.toMatchObject([
      { id: 'Danielle' },
      { id: 'Joanna' },
      { id: 'Matthew' },
    ]);
    await expect(catalog.filter('en-US', 'generative')).resolves.toMatchObject([{ id: 'Joanna' }, { id: 'Matthew' }]);
    await expect(catalog.filter('en-GB', 'neural')).resolves.toEqual([]);
    await expect(catalog.filter('de-DE', 'generative')).resolves.toEqual([]);
  });

  it('resolves synthesis ids only for voices Polly listed', async () => {
    servePages([FIRST_PAGE, SECOND_PAGE]);

    await expect(catalog.resolvePollyVoiceId('Danielle')).resolves.toBe('Danielle');
    await expect(catalog.resolvePollyVoiceId('Orphan')).resolves.toBeUndefined();
    await expect(catalog.resolvePollyVoiceId('Nobody')).resolves.toBeUndefined();
  });

  it('lists each language once, sorted', async () => {
    servePages([FIRST_PAGE, SECOND_PAGE]);

    await expect(catalog.listLanguages()).resolves.toEqual(['en-GB', 'en-US', 'fr-FR']);
  });

  it('defaults to US English when it is offered', async () => {
    servePages([FIRST_PAGE]);

    await expect(catalog.defaultLanguage()).resolves.toBe('en-US');
  });

  it('otherwise defaults to the first language', async () => {
    servePages([[FIRST_PAGE[1], SECOND_PAGE[0]]]);

    await expect(catalog.defaultLanguage()).resolves.toBe('en-GB');
  });
});
