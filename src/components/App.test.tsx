import React from 'react';
import {render} from 'ink-testing-library';
import {describe, it, expect, vi} from 'vitest';
import {Effect} from 'effect';
import {ConfigSource} from '../types/index.js';
import {PositionController} from '../services/positionController.js';
import {DEFAULT_CONFIGURATION} from '../services/configurationManager.js';
import type {DeskRuntime} from '../services/deskRuntime.js';
import type {MenuChoice} from './PositionMenu.js';

type InputHandler = (input: string, key: {ctrl: boolean}) => void;

const captured = vi.hoisted(() => {
	const state: {
		onSelect: ((item: {value: MenuChoice}) => void) | null;
		onInput: InputHandler | null;
	} = {
		onSelect: null,
		onInput: null,
	};
	return state;
});

vi.mock('../utils/logger.js', async importOriginal => {
	const actual = await importOriginal<typeof import('../utils/logger.js')>();
	return {
		...actual,
		logger: {
			info: vi.fn(),
			warn: vi.fn(),
			error: vi.fn(),
			debug: vi.fn(),
		},
	};
});

vi.mock('ink', async () => {
	const actual = await vi.importActual<typeof import('ink')>('ink');
	return {
		...actual,
		useInput: (handler: InputHandler) => {
			captured.onInput = handler;
		},
	};
});

vi.mock('ink-select-input', async () => {
	const {Text} = await vi.importActual<typeof import('ink')>('ink');
	const React = await vi.importActual<typeof import('react')>('react');

	return {
		default: ({onSelect}: {onSelect: (item: {value: MenuChoice}) => void}) => {
			captured.onSelect = onSelect;
			return React.createElement(Text, {}, 'menu');
		},
	};
});

const {default: App} = await import('./App.js');

const settle = (ms = 50) => new Promise(resolve => setTimeout(resolve, ms));

describe('App', () => {
	const configSource: ConfigSource = {
		configPath: '/tmp/idasen.yaml',
		positions: () => Effect.succeed({sit: 0.7, stand: 1.1}),
	};

	const deskMover = {move: vi.fn()};

	const createRuntime = (): DeskRuntime => {
		deskMover.move.mockClear();
		return {
			configuration: DEFAULT_CONFIGURATION,
			configSource,
			deskMover,
			controller: new PositionController({
				configSource,
				deskMover,
				dwellPolicy: {sit: 200, stand: 200},
			}),
		};
	};

	it('stops the dwell timer when the user quits with Ctrl+C', async () => {
		const runtime = createRuntime();
		render(<App runtime={runtime} />);
		await settle();

		captured.onSelect?.({value: {kind: 'position', position: 'sit'}});
		await settle();
		expect(runtime.controller.getSnapshot().dwell?.position).toBe('sit');

		captured.onInput?.('c', {ctrl: true});
		await settle();

		expect(runtime.controller.getSnapshot().dwell).toBeNull();
		await settle(300);
		expect(deskMover.move.mock.calls).toEqual([['sit']]);
		expect(runtime.controller.getCurrentPosition()).toBe('sit');
	});

	it('shows the toggle pair in the header', async () => {
		const runtime = createRuntime();
		const {lastFrame, unmount} = render(<App runtime={runtime} />);
		await settle();

		expect(lastFrame()).toContain('Nagging: sit <-> stand');

		unmount();
		await runtime.controller.dispose();
	});
});
