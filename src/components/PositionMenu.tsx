import React, {useCallback, useEffect, useState} from 'react';
import {Box, Text, useInput} from 'ink';
import SelectInput from 'ink-select-input';
import {Effect, Either} from 'effect';
import {
	ConfigSource,
	ControllerSnapshot,
	Position,
	PositionChangeListener,
	PositionMap,
} from '../types/index.js';
import {formatAppError} from '../types/errors.js';
import {PositionController} from '../services/positionController.js';
import {formatDuration} from '../utils/formatDuration.js';

interface PositionMenuProps {
	controller: PositionController;
	configSource: ConfigSource;
	onExit: () => void;
}

export type MenuChoice =
	| {kind: 'position'; position: Position}
	| {kind: 'exit'};

export interface MenuItem {
	key: string;
	label: string;
	value: MenuChoice;
}

export function buildMenuItems(
	positions: PositionMap | null,
	currentPosition: Position | null,
): MenuItem[] {
	const items: MenuItem[] = Object.entries(positions ?? {}).map(
		([name, height]) => ({
			key: `position:${name}`,
			label: `${name === currentPosition ? '●' : ' '} ${name}  (${height}m)`,
			value: {kind: 'position', position: name},
		}),
	);
	items.push({key: 'exit', label: '  Exit', value: {kind: 'exit'}});
	return items;
}

/**
 * Position picker. Positions are re-read from the desk configuration on
 * mount and after every selection.
 */
const PositionMenu: React.FC<PositionMenuProps> = ({
	controller,
	configSource,
	onExit,
}) => {
	const [positions, setPositions] = useState<PositionMap | null>(null);
	const [error, setError] = useState<string | null>(null);
	const [snapshot, setSnapshot] = useState<ControllerSnapshot>(() =>
		controller.getSnapshot(),
	);
	const [now, setNow] = useState(() => Date.now());

	const loadPositions = useCallback(async () => {
		const result = await Effect.runPromise(
			Effect.either(configSource.positions()),
		);
		if (Either.isLeft(result)) {
			setPositions(null);
			setError(formatAppError(result.left));
			return;
		}
		setPositions(result.right);
	}, [configSource]);

	useEffect(() => {
		void loadPositions();
	}, [loadPositions]);

	// Dwell toggles happen without user input
	useEffect(() => {
		const listener: PositionChangeListener = next => {
			setSnapshot(next);
			setNow(Date.now());
		};
		controller.onChange(listener);
		return () => {
			controller.offChange(listener);
		};
	}, [controller]);

	useEffect(() => {
		if (!snapshot.dwell) {
			return;
		}
		const interval = setInterval(() => {
			setNow(Date.now());
		}, 1000);
		return () => {
			clearInterval(interval);
		};
	}, [snapshot.dwell]);

	useInput((input, key) => {
		if (input === 'q' || (key.ctrl && input === 'c')) {
			onExit();
		}
	});

	const handleSelect = (item: {value: MenuChoice}) => {
		const choice = item.value;
		if (choice.kind === 'exit') {
			onExit();
			return;
		}

		void controller.requestPositionChange(choice.position).then(
			result => {
				if (Either.isLeft(result)) {
					setError(formatAppError(result.left));
				} else {
					setError(null);
					setSnapshot(controller.getSnapshot());
					setNow(Date.now());
				}
				return loadPositions();
			},
			(failure: unknown) => {
				setError(String(failure));
			},
		);
	};

	const next = controller.complementOf(snapshot.currentPosition);

	return (
		<Box flexDirection="column">
			<Text>
				Current position:{' '}
				<Text color="green" bold>
					{snapshot.currentPosition ?? 'unknown'}
				</Text>
			</Text>
			{snapshot.dwell ? (
				<Text color="yellow">
					{next
						? `Switching to ${next} in ${formatDuration(snapshot.dwell.endsAt - now)}`
						: `Dwell time ends in ${formatDuration(snapshot.dwell.endsAt - now)}`}
				</Text>
			) : (
				<Text dimColor>
					{snapshot.naggingEnabled ? 'No dwell timer running' : 'Nagging disabled'}
				</Text>
			)}
			{error && <Text color="red">Error: {error}</Text>}
			<Box marginTop={1}>
				<SelectInput
					items={buildMenuItems(positions, snapshot.currentPosition)}
					onSelect={handleSelect}
				/>
			</Box>
			<Text dimColor>Enter to move · q to quit</Text>
		</Box>
	);
};

export default PositionMenu;
