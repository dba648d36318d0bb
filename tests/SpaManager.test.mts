import { test } from 'node:test';
import assert from 'node:assert/strict';
import { SpaManager } from '../lib/manager/SpaManager.mjs';
import { SPA_EVENTS, SPA_STATES } from '../lib/SpaProtocol.mjs';
import { ERROR_CODES, SpaManagerError, isAbortError } from '../lib/errors.mjs';
import {
  CLIENT_UUID,
  FakeLocatorFactory,
  RecordingHandler,
  createTestManager,
  makeDescriptor,
  silentLogger,
} from './helpers/fakes.mjs';

const isPreconditionError = (error: unknown) =>
  error instanceof SpaManagerError && error.code === ERROR_CODES.PRECONDITION_FAILED;

test('SpaManager: starts idle with nothing discovered', () => {
  const { manager } = createTestManager();

  assert.equal(manager.spaState, SPA_STATES.IDLE);
  assert.equal(manager.statusLine, 'State: idle, last event none');
  assert.equal(manager.spaDescriptors, null);
  assert.equal(manager.facade, null);
  assert.equal(manager.isConnected, false);
  assert.equal(manager.toString(), 'State: idle, last event none');
});

test('SpaManager: derives the client id and normalises empty hints', () => {
  const { manager } = createTestManager({ spaAddress: '', spaIdentifier: '', spaName: 'Garden tub' });

  assert.equal(manager.clientId.toString('latin1'), `IOS${CLIENT_UUID}`);
  assert.equal(manager.spaAddress, null);
  assert.equal(manager.spaIdentifier, null);
  assert.equal(manager.spaName, 'Garden tub');
});

test('SpaManager: rejects an invalid client UUID', () => {
  assert.throws(
    () =>
      new SpaManager({
        clientUuid: 'not-a-uuid',
        handler: new RecordingHandler(),
        createSession: () => {
          throw new Error('unused');
        },
        createFacade: () => {
          throw new Error('unused');
        },
        logger: silentLogger,
      }),
    (error: unknown) =>
      error instanceof SpaManagerError && error.code === ERROR_CODES.INVALID_CLIENT_UUID
  );
});

test('SpaManager: locateSpas stores descriptors and returns to idle', async () => {
  const first = makeDescriptor('SPA1');
  const second = makeDescriptor('SPA2');
  const { manager, handler, locators } = createTestManager({
    locators: new FakeLocatorFactory([first, second]),
  });

  const found = await manager.locateSpas();

  assert.deepEqual(found, [first, second]);
  assert.deepEqual(manager.spaDescriptors, [first, second]);
  assert.deepEqual(locators.calls, [{ spaAddress: null, spaIdentifier: null }]);
  assert.deepEqual(handler.names, [
    SPA_EVENTS.LOCATING_STARTED,
    SPA_EVENTS.LOCATING_DISCOVERED_SPA,
    SPA_EVENTS.LOCATING_DISCOVERED_SPA,
    SPA_EVENTS.LOCATING_FINISHED,
  ]);
  assert.deepEqual(
    handler.events.map((entry) => entry.state),
    [SPA_STATES.LOCATING_SPAS, SPA_STATES.LOCATING_SPAS, SPA_STATES.LOCATING_SPAS, SPA_STATES.IDLE]
  );
  assert.deepEqual(handler.find(SPA_EVENTS.LOCATING_DISCOVERED_SPA)?.payload, { spaDescriptor: first });
  assert.deepEqual(handler.find(SPA_EVENTS.LOCATING_FINISHED)?.payload, {
    spaDescriptors: [first, second],
  });
  assert.equal(manager.spaState, SPA_STATES.IDLE);
  assert.equal(manager.statusLine, 'State: idle, last event locating-finished');
});

test('SpaManager: locateSpas emits locating-finished before a locator failure propagates', async () => {
  const { manager, handler } = createTestManager({
    locators: new FakeLocatorFactory(new Error('socket closed')),
  });

  await assert.rejects(manager.locateSpas('10.0.0.2'), /socket closed/);

  assert.deepEqual(handler.names, [SPA_EVENTS.LOCATING_STARTED, SPA_EVENTS.LOCATING_FINISHED]);
  assert.deepEqual(handler.find(SPA_EVENTS.LOCATING_FINISHED)?.payload, { spaDescriptors: null });
  assert.equal(manager.spaState, SPA_STATES.IDLE);
  assert.equal(manager.spaDescriptors, null);
});

test('SpaManager: connect reports spa-not-found when discovery is empty', async () => {
  const { manager, handler, locators, sessions } = createTestManager();

  const facade = await manager.connect('ABC', '10.0.0.2');

  assert.equal(facade, null);
  assert.deepEqual(locators.calls, [{ spaAddress: '10.0.0.2', spaIdentifier: 'ABC' }]);
  assert.deepEqual(handler.names, [
    SPA_EVENTS.LOCATING_STARTED,
    SPA_EVENTS.LOCATING_FINISHED,
    SPA_EVENTS.SPA_NOT_FOUND,
  ]);
  assert.deepEqual(handler.find(SPA_EVENTS.SPA_NOT_FOUND)?.payload, {
    spaAddress: '10.0.0.2',
    spaIdentifier: 'ABC',
  });
  assert.equal(sessions.sessions.length, 0);
  assert.equal(manager.spaState, SPA_STATES.ERROR_SPA_NOT_FOUND);
});

test('SpaManager: connect uses the first descriptor found', async () => {
  const { manager, sessions } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('ABC', 'Patio'), makeDescriptor('ABC2', 'Deck')]),
  });

  const facade = await manager.connect('ABC');

  assert.ok(facade);
  assert.equal(facade.name, 'Patio');
  assert.equal(sessions.sessions.length, 1);
  assert.equal(sessions.last.descriptor.identifier, 'ABC');
});

test('SpaManager: discover then connect to a descriptor ends connected', async () => {
  const first = makeDescriptor('SPA1', 'Patio');
  const { manager, handler, sessions } = createTestManager({
    locators: new FakeLocatorFactory([first, makeDescriptor('SPA2', 'Deck')]),
  });

  const found = await manager.locateSpas();
  assert.ok(found);
  const [target] = found;
  assert.ok(target);

  handler.events = [];
  const facade = await manager.connectToSpa(target);

  assert.ok(facade);
  assert.equal(manager.facade, facade);
  assert.equal(facade.name, 'Patio');
  assert.deepEqual(handler.names, [
    SPA_EVENTS.CONNECTION_STARTED,
    SPA_EVENTS.SESSION_PROTOCOL_COMPLETE,
    SPA_EVENTS.CONNECTION_FINISHED,
  ]);
  assert.deepEqual(
    handler.events.map((entry) => entry.state),
    [SPA_STATES.CONNECTING, SPA_STATES.SPA_READY, SPA_STATES.CONNECTED]
  );
  assert.deepEqual(handler.find(SPA_EVENTS.CONNECTION_FINISHED)?.payload, { facade });
  assert.equal(sessions.last.descriptor, first);
  assert.deepEqual(sessions.last.clientId, manager.clientId);
  assert.equal(manager.spaState, SPA_STATES.CONNECTED);
  assert.equal(manager.isConnected, true);
});

test('SpaManager: no facade when the session never reports protocol completion', async () => {
  const { manager, handler, sessions } = createTestManager();
  sessions.completes = false;

  const facade = await manager.connectToSpa(makeDescriptor('SPA1'));

  assert.equal(facade, null);
  assert.deepEqual(handler.names, [SPA_EVENTS.CONNECTION_STARTED, SPA_EVENTS.CONNECTION_FINISHED]);
  assert.deepEqual(handler.find(SPA_EVENTS.CONNECTION_FINISHED)?.payload, { facade: null });
  assert.equal(manager.spaState, SPA_STATES.CONNECTING);
});

test('SpaManager: connection-finished fires before a session failure propagates', async () => {
  const { manager, handler, sessions } = createTestManager();
  sessions.failure = new Error('handshake refused');

  await assert.rejects(manager.connectToSpa(makeDescriptor('SPA1')), /handshake refused/);

  assert.deepEqual(handler.names, [SPA_EVENTS.CONNECTION_STARTED, SPA_EVENTS.CONNECTION_FINISHED]);
  assert.deepEqual(handler.find(SPA_EVENTS.CONNECTION_FINISHED)?.payload, { facade: null });
  assert.equal(manager.facade, null);
});

test('SpaManager: connecting twice without a reset is a precondition failure', async () => {
  const { manager, handler } = createTestManager();
  await manager.connectToSpa(makeDescriptor('SPA1'));
  const eventsBefore = handler.events.length;

  await assert.rejects(manager.connectToSpa(makeDescriptor('SPA2')), isPreconditionError);
  assert.equal(handler.events.length, eventsBefore);
});

test('SpaManager: a failed connection still blocks a second attempt until reset', async () => {
  const { manager, sessions } = createTestManager();
  sessions.completes = false;
  await manager.connectToSpa(makeDescriptor('SPA1'));

  await assert.rejects(manager.connectToSpa(makeDescriptor('SPA1')), isPreconditionError);

  await manager.reset();
  sessions.completes = true;
  const facade = await manager.connectToSpa(makeDescriptor('SPA1'));
  assert.ok(facade);
});

test('SpaManager: overlapping connect attempts own a single session', async () => {
  const { manager, sessions } = createTestManager();

  const results = await Promise.allSettled([
    manager.connectToSpa(makeDescriptor('SPA1')),
    manager.connectToSpa(makeDescriptor('SPA2')),
  ]);

  assert.deepEqual(
    results.map((result) => result.status),
    ['fulfilled', 'rejected']
  );
  const [, second] = results;
  assert.ok(second?.status === 'rejected' && isPreconditionError(second.reason));
  assert.equal(sessions.sessions.length, 1);

  await manager.reset();
  assert.equal(sessions.last.disconnects, 1);
  assert.equal(sessions.last.connected, false);
});

test('SpaManager: reset disconnects the session and clears everything', async () => {
  const { manager, sessions } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('SPA1')]),
  });
  await manager.connect('SPA1');
  const session = sessions.last;

  await manager.reset();

  assert.equal(session.disconnects, 1);
  assert.equal(manager.facade, null);
  assert.equal(manager.spaDescriptors, null);
  assert.equal(manager.spaState, SPA_STATES.IDLE);

  await manager.reset();
  assert.equal(session.disconnects, 1);
});

test('SpaManager: ping-received after a missed ping resets the manager', async () => {
  const { manager, handler, sessions } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('SPA1')]),
  });
  await manager.connect('SPA1');
  const session = sessions.last;

  await session.emit(SPA_EVENTS.PING_MISSED, {});
  assert.equal(manager.spaState, SPA_STATES.ERROR_PING_MISSED);
  assert.equal(manager.statusLine, 'State: error_ping_missed, last event ping-missed');

  await session.emit(SPA_EVENTS.PING_RECEIVED, {});

  assert.equal(manager.spaState, SPA_STATES.IDLE);
  assert.equal(manager.facade, null);
  assert.equal(manager.spaDescriptors, null);
  assert.equal(session.disconnects, 1);
  assert.equal(handler.events.at(-1)?.event, SPA_EVENTS.PING_RECEIVED);
  assert.equal(handler.events.at(-1)?.state, SPA_STATES.IDLE);
});

test('SpaManager: ping-received is forwarded even when the recovery disconnect fails', async () => {
  const { manager, handler, sessions } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('SPA1')]),
  });
  await manager.connect('SPA1');
  const session = sessions.last;
  session.disconnectFailure = new Error('socket gone');

  await session.emit(SPA_EVENTS.PING_MISSED, {});
  await session.emit(SPA_EVENTS.PING_RECEIVED, {});

  assert.equal(session.disconnects, 1);
  assert.equal(manager.spaState, SPA_STATES.IDLE);
  assert.equal(manager.facade, null);
  assert.equal(manager.statusLine, 'State: idle, last event ping-received');
  assert.equal(handler.events.at(-1)?.event, SPA_EVENTS.PING_RECEIVED);
});

test('SpaManager: ping-received while connected changes nothing', async () => {
  const { manager, sessions } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('SPA1')]),
  });
  await manager.connect('SPA1');

  await sessions.last.emit(SPA_EVENTS.PING_RECEIVED, {});

  assert.equal(manager.spaState, SPA_STATES.CONNECTED);
  assert.ok(manager.facade);
  assert.equal(sessions.last.disconnects, 0);
});

test('SpaManager: RF faults escalate and recover on the next ping', async () => {
  const { manager, sessions } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('SPA1')]),
  });
  await manager.connect('SPA1');
  const session = sessions.last;

  await session.emit(SPA_EVENTS.RF_ERROR, {});
  assert.equal(manager.spaState, SPA_STATES.ERROR_RF_FAULT);

  await session.emit(SPA_EVENTS.TOO_MANY_RF_ERRORS, {});
  assert.equal(manager.spaState, SPA_STATES.ERROR_NEEDS_ATTENTION);

  await session.emit(SPA_EVENTS.PING_RECEIVED, {});
  assert.equal(manager.spaState, SPA_STATES.IDLE);
  assert.equal(session.disconnects, 1);
});

test('SpaManager: every event is forwarded in order with its payload', async () => {
  const { manager, handler, sessions } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('SPA1')]),
  });
  await manager.connect('SPA1');
  const session = sessions.last;
  handler.events = [];

  await session.emit(SPA_EVENTS.SESSION_DISCONNECTED, {});
  await session.emit(SPA_EVENTS.PING_MISSED, {});
  await session.emit(SPA_EVENTS.PROTOCOL_RETRY_EXCEEDED, {});
  await session.emit(SPA_EVENTS.PING_RECEIVED, {});

  assert.deepEqual(
    handler.events.map(({ event, payload }) => ({ event, payload })),
    [
      { event: SPA_EVENTS.SESSION_DISCONNECTED, payload: {} },
      { event: SPA_EVENTS.PING_MISSED, payload: {} },
      { event: SPA_EVENTS.PROTOCOL_RETRY_EXCEEDED, payload: {} },
      { event: SPA_EVENTS.PING_RECEIVED, payload: {} },
    ]
  );
  assert.deepEqual(
    handler.events.map((entry) => entry.state),
    [
      SPA_STATES.CONNECTED,
      SPA_STATES.ERROR_PING_MISSED,
      SPA_STATES.ERROR_NEEDS_ATTENTION,
      SPA_STATES.IDLE,
    ]
  );
});

test('SpaManager: setSpaInfo replaces hints and resets', async () => {
  const { manager } = createTestManager({
    locators: new FakeLocatorFactory([makeDescriptor('SPA1')]),
  });
  await manager.locateSpas();

  await manager.setSpaInfo('', 'SPA1', 'Patio');

  assert.equal(manager.spaAddress, null);
  assert.equal(manager.spaIdentifier, 'SPA1');
  assert.equal(manager.spaName, 'Patio');
  assert.equal(manager.spaDescriptors, null);
  assert.equal(manager.spaState, SPA_STATES.IDLE);
});

test('SpaManager: waiters resolve once values become available', async () => {
  const descriptor = makeDescriptor('SPA1');
  const { manager } = createTestManager({ locators: new FakeLocatorFactory([descriptor]) });

  const descriptors = manager.waitForDescriptors();
  const facade = manager.waitForFacade();

  await manager.connect('SPA1');

  assert.deepEqual(await descriptors, [descriptor]);
  assert.equal(await facade, manager.facade);
  assert.equal(await manager.waitForFacade(), manager.facade);
});

test('SpaManager: waiters reject when their signal aborts', async () => {
  const { manager } = createTestManager();
  const controller = new AbortController();

  const facade = manager.waitForFacade(controller.signal);
  controller.abort();

  await assert.rejects(facade, (error: unknown) => isAbortError(error));
  await assert.rejects(manager.waitForDescriptors(controller.signal), (error: unknown) =>
    isAbortError(error)
  );
});
