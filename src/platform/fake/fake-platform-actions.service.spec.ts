import { Logger } from '@nestjs/common';

import { FakePlatformActions } from './fake-platform-actions.service';

describe('FakePlatformActions', () => {
  let actions: FakePlatformActions;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    actions = new FakePlatformActions();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should capture calls in order', async () => {
    await actions.wake();
    await actions.setVolume(65);
    await actions.openUrl('https://example.com/fajr');

    expect(actions.actions.map(({ action, argument }) => ({ action, argument }))).toEqual([
      { action: 'wake', argument: undefined },
      { action: 'setVolume', argument: 65 },
      { action: 'openUrl', argument: 'https://example.com/fajr' },
    ]);
  });

  it('should list opened URLs', async () => {
    await actions.openUrl('https://example.com/fajr');
    await actions.wake();
    await actions.openUrl('https://example.com/dhuhr');

    expect(actions.getOpenedUrls()).toEqual([
      'https://example.com/fajr',
      'https://example.com/dhuhr',
    ]);
  });

  it('should reject configured actions and still capture them', async () => {
    actions.failOn('openUrl', new Error('no browser'));

    await expect(actions.openUrl('https://example.com/asr')).rejects.toThrow('no browser');
    expect(actions.getOpenedUrls()).toEqual(['https://example.com/asr']);
  });

  it('should clear calls and failures on reset', async () => {
    actions.failOn('wake');
    await expect(actions.wake()).rejects.toThrow('wake failed');

    actions.reset();
    await actions.wake();

    expect(actions.actions).toHaveLength(1);
  });
});
