import React from 'react';
import {Box, useApp} from 'ink';
import Header from './Header.js';
import PositionMenu from './PositionMenu.js';
import {DeskRuntime} from '../services/deskRuntime.js';
import {logger} from '../utils/logger.js';

interface AppProps {
	runtime: DeskRuntime;
	isDevMode?: boolean;
}

const App: React.FC<AppProps> = ({runtime, isDevMode}) => {
	const {exit} = useApp();
	const {controller, configSource} = runtime;

	const handleExit = () => {
		void controller.dispose().then(
			() => exit(),
			(error: unknown) => {
				logger.error('Failed to stop position controller', error);
				exit();
			},
		);
	};

	const subtitle = controller.isNaggingEnabled()
		? `Nagging: ${controller.getTogglePositions().join(' <-> ')}`
		: 'Nagging off';

	return (
		<Box flexDirection="column">
			<Header subtitle={subtitle} isDevMode={isDevMode} />
			<PositionMenu
				controller={controller}
				configSource={configSource}
				onExit={handleExit}
			/>
		</Box>
	);
};

export default App;
