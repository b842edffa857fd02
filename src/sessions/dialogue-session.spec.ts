import {
  NoVoicesForFilterError,
  SessionBusyError,
  TurnLimitError,
  TurnNotFoundError,
  VoiceNotAvailableError,
} from '../domain/errors';
import { DialogueSettings, Voice } from '../domain/types';
import { DialogueSession } from './dialogue-session';

function voice(id: string, languageCode = 'en-US'): Voice {
  return { id, name: id, languageCode, supportedTiers: ['generative', 'neural'] };
}

const SETTINGS: DialogueSettings = { languageCode: 'en-US', qualityTier: 'generative', sampleRate: '22050' };
const US_VOICES = [voice('Danielle'), voice('Joanna'), voice('Matthew')];

describe('DialogueSession', () => {
  const create = (voices: Voice[] = US_VOICES, maxTurns = 20) =>
    DialogueSession.create('session-1', SETTINGS, voices, { maxTurns });

  it('opens with two turns on the first two voices', () => {
    const session = create();

    expect(session.listTurns().map(({ voiceId, rawText, pauseAfterMs }) => ({ voiceId, rawText, pauseAfterMs }))).toEqual([
      { voiceId: 'Danielle', rawText: 'Hello!\nHow are you?', pauseAfterMs: 0 },
      { voiceId: 'Joanna', rawText: 'Great, thanks!\nReady for the meeting?', pauseAfterMs: 0 },
    ]);
    expect(new Set(session.listTurns().map((turn) => turn.id)).size).toBe(2);
  });

  it('reuses the only voice when just one is offered', () => {
    const session = create([voice('Lupe')]);

    expect(session.listTurns().map((turn) => turn.voiceId)).toEqual(['Lupe', 'Lupe']);
  });

  it('cannot start without voices', () => {
    expect(() => create([])).toThrow(NoVoicesForFilterError);
  });

  it('adds blank turns cycling through the voices', () => {
    const session = create();

    const third = session.addTurn();
    const fourth = session.addTurn();

    expect(third).toMatchObject({ voiceId: 'Matthew', rawText: '', pauseAfterMs: 0 });
    expect(fourth).toMatchObject({ voiceId: 'Danielle', rawText: '', pauseAfterMs: 0 });
    expect(session.listTurns()).toHaveLength(4);
  });

  it('stops adding at the turn limit', () => {
    const session = create(US_VOICES, 3);
    session.addTurn();

    expect(() => session.addTurn()).toThrow(new TurnLimitError(3));
    expect(session.listTurns()).toHaveLength(3);
  });

  it('edits a turn in place', () => {
    const session = create();
    const [first] = session.listTurns();

    const updated = session.updateTurn(first.id, { voiceId: 'Matthew', pauseAfterMs: 700 });

    expect(updated).toEqual({ id: first.id, voiceId: 'Matthew', rawText: 'Hello!\nHow are you?', pauseAfterMs: 700 });
    expect(session.listTurns()[0].voiceId).toBe('Matthew');
  });

  it('refuses a voice outside the current filter', () => {
    const session = create();
    const [first] = session.listTurns();

    expect(() => session.updateTurn(first.id, { voiceId: 'Lea', rawText: 'Bonjour' })).toThrow(VoiceNotAvailableError);
    expect(session.listTurns()[0]).toMatchObject({ voiceId: 'Danielle', rawText: 'Hello!\nHow are you?' });
  });

  it('removes turns by id, down to none', () => {
    const session = create();
    const [first, second] = session.listTurns();

    session.removeTurn(first.id);
    expect(session.listTurns().map((turn) => turn.id)).toEqual([second.id]);
    session.removeTurn(second.id);
    expect(session.listTurns()).toEqual([]);
    expect(() => session.removeTurn(second.id)).toThrow(TurnNotFoundError);
  });

  it('resets voices the new filter drops to its first voice', () => {
    const session = create();
    const [first, second] = session.listTurns();
    session.updateTurn(second.id, { voiceId: 'Matthew' });

    session.applySettings({ ...SETTINGS, qualityTier: 'neural' }, [voice('Joanna'), voice('Matthew')]);

    expect(session.settings.qualityTier).toBe('neural');
    expect(session.listTurns().map((turn) => turn.voiceId)).toEqual(['Joanna', 'Matthew']);
    expect(session.listTurns()[0].id).toBe(first.id);
  });

  it('keeps everything when the new filter has no voices', () => {
    const session = create();

    expect(() => session.applySettings({ ...SETTINGS, languageCode: 'is-IS' }, [])).toThrow(
      new NoVoicesForFilterError('is-IS', 'generative'),
    );
    expect(session.settings).toEqual(SETTINGS);
    expect(session.availableVoices.map((v) => v.id)).toEqual(['Danielle', 'Joanna', 'Matthew']);
    expect(session.listTurns().map((turn) => turn.voiceId)).toEqual(['Danielle', 'Joanna']);
  });

  it('snapshots turns as copies', () => {
    const session = create();
    const snapshot = session.snapshot();

    session.updateTurn(session.listTurns()[0].id, { rawText: 'Changed' });

    expect(snapshot[0]).toEqual({ voiceId: 'Danielle', rawText: 'Hello!\nHow are you?', pauseAfterMs: 0 });
  });

  it('rejects edits while generating', () => {
    const session = create();
    const [first] = session.listTurns();
    session.beginGeneration();

    expect(session.isGenerating).toBe(true);
    expect(() => session.addTurn()).toThrow(SessionBusyError);
    expect(() => session.updateTurn(first.id, { rawText: 'x' })).toThrow(SessionBusyError);
    expect(() => session.removeTurn(first.id)).toThrow(SessionBusyError);
    expect(() => session.applySettings(SETTINGS, US_VOICES)).toThrow(SessionBusyError);
    expect(() => session.beginGeneration()).toThrow(SessionBusyError);

    session.endGeneration();
    expect(session.addTurn()).toMatchObject({ voiceId: 'Matthew' });
  });
});
