import { describe, it, expect } from 'vitest';
import { FormTimer, decodeStamp, encodeStamp } from './form-timer.js';
import { SessionHelper } from '../session/session-helper.js';
import { fakeRequest } from '../test/fakes.js';

const T0 = 1_700_000_000.25;
const clock = (seconds: number) => () => seconds;

function sessionTimer(session: SessionHelper, now: number, minRequestTime?: number): FormTimer {
  return new FormTimer(fakeRequest(), session, {
    useSession: true,
    sessionFieldName: 'Timer.Last',
    minRequestTime,
    now: clock(now),
  });
}

// ── session mode ─────────────────────────────────────────────────────────────

describe('FormTimer — session mode', () => {
  it('is not a request on first render and primes the session', () => {
    const session = new SessionHelper();
    const timer = sessionTimer(session, T0);
    expect(timer.isRequest()).toBe(false);
    expect(timer.isValidRequest()).toBe(false);
    expect(timer.getCurrentFormStamp()).toBe(T0);
    expect(session.getFieldValue('Timer.Last', null)).toBe(T0);
  });

  it('accepts a submission made after the minimum time', () => {
    const session = new SessionHelper();
    sessionTimer(session, T0);
    const timer = sessionTimer(session, T0 + 1.5);
    expect(timer.isRequest()).toBe(true);
    expect(timer.isValidRequest()).toBe(true);
    expect(timer.getLastFormStamp()).toBe(T0);
  });

  it('rejects a submission made too fast', () => {
    const session = new SessionHelper();
    sessionTimer(session, T0);
    const timer = sessionTimer(session, T0 + 0.1);
    expect(timer.isRequest()).toBe(true);
    expect(timer.isValidRequest()).toBe(false);
  });

  it('overwrites the stored stamp on every reload', () => {
    const session = new SessionHelper();
    sessionTimer(session, T0);
    sessionTimer(session, T0 + 5);
    expect(session.getFieldValue('Timer.Last', null)).toBe(T0 + 5);
  });

  it('parses stamps stored with a comma decimal separator', () => {
    const session = new SessionHelper({ Timer: { Last: '100,5' } });
    const timer = sessionTimer(session, 102);
    expect(timer.getLastFormStamp()).toBe(100.5);
    expect(timer.isValidRequest()).toBe(true);
  });

  it('rejects a stored stamp that is not a number', () => {
    const session = new SessionHelper({ Timer: { Last: 'garbage' } });
    const timer = sessionTimer(session, T0);
    expect(timer.isRequest()).toBe(true);
    expect(timer.isValidRequest()).toBe(false);
  });

  it('renders no hidden field', () => {
    const timer = sessionTimer(new SessionHelper(), T0);
    timer.setFormFieldName('fts');
    expect(timer.buildHiddenFieldHtml()).toBe('');
  });
});

// ── minimum request time ─────────────────────────────────────────────────────

describe('FormTimer — minimum request time', () => {
  it('enforces the 1.5 second floor', () => {
    expect(sessionTimer(new SessionHelper(), T0, 0.5).getMinRequestTime()).toBe(1.5);
    expect(sessionTimer(new SessionHelper(), T0).getMinRequestTime()).toBe(1.5);
  });

  it('keeps larger values', () => {
    expect(sessionTimer(new SessionHelper(), T0, 4).getMinRequestTime()).toBe(4);
  });

  it('applies the floor in the setter', () => {
    const timer = sessionTimer(new SessionHelper(), T0, 4);
    expect(timer.setMinRequestTime(1).getMinRequestTime()).toBe(1.5);
    expect(timer.setMinRequestTime(Number.NaN).getMinRequestTime()).toBe(1.5);
    expect(timer.setMinRequestTime().getMinRequestTime()).toBe(1.5);
  });

  it('uses the configured time when validating', () => {
    const session = new SessionHelper();
    sessionTimer(session, T0, 3);
    expect(sessionTimer(session, T0 + 2, 3).isValidRequest()).toBe(false);
  });
});

// ── hidden-field mode ────────────────────────────────────────────────────────

describe('FormTimer — hidden-field mode', () => {
  function fieldTimer(post: Record<string, string>, now: number): FormTimer {
    return new FormTimer(fakeRequest(post), new SessionHelper(), {
      useSession: false,
      sessionFieldName: '',
      formFieldName: 'fts',
      now: clock(now),
    });
  }

  it('encodes the stamp with the prefix tag and base64', () => {
    expect(encodeStamp(100.5)).toBe('Uk7MTAwLjU=');
    expect(decodeStamp('Uk7MTAwLjU=')).toBe(100.5);
  });

  it('decodes comma separated stamps', () => {
    const encoded = 'Uk7' + Buffer.from('100,5').toString('base64');
    expect(decodeStamp(encoded)).toBe(100.5);
  });

  it('builds the hidden field markup', () => {
    const timer = fieldTimer({}, 100.5);
    expect(timer.buildHiddenFieldHtml()).toBe('<input type="hidden" name="fts" value="Uk7MTAwLjU=">');
    expect(timer.buildHiddenFieldHtml(true, 'ts')).toBe(
      '<input type="hidden" name="fts" value="Uk7MTAwLjU=" id="ts" />',
    );
  });

  it('renders nothing without a form field name', () => {
    const timer = fieldTimer({}, 100.5).setFormFieldName(null);
    expect(timer.buildHiddenFieldHtml()).toBe('');
  });

  it('is not a request when the field is absent', () => {
    const timer = fieldTimer({}, T0);
    expect(timer.isRequest()).toBe(false);
    expect(timer.isValidRequest()).toBe(false);
  });

  it('accepts a stamp old enough', () => {
    const rendered = fieldTimer({}, T0).buildHiddenFieldHtml();
    const value = /value="([^"]+)"/.exec(rendered)?.[1] ?? '';
    const timer = fieldTimer({ fts: value }, T0 + 2);
    expect(timer.isRequest()).toBe(true);
    expect(timer.isValidRequest()).toBe(true);
    expect(timer.getLastFormStamp()).toBe(T0);
  });

  it('rejects a stamp too recent', () => {
    const timer = fieldTimer({ fts: encodeStamp(T0) }, T0 + 1);
    expect(timer.isRequest()).toBe(true);
    expect(timer.isValidRequest()).toBe(false);
  });

  it('rejects a value that does not decode to a number', () => {
    const timer = fieldTimer({ fts: 'Uk7!!!' }, T0);
    expect(timer.isRequest()).toBe(true);
    expect(timer.isValidRequest()).toBe(false);
  });

  it('leaves the session untouched', () => {
    const session = new SessionHelper();
    new FormTimer(fakeRequest(), session, {
      useSession: false,
      sessionFieldName: 'Timer.Last',
      formFieldName: 'fts',
      now: clock(T0),
    });
    expect(session.dirty).toBe(false);
  });
});
