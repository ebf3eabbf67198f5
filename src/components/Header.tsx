import React from 'react';
import {Box, Text} from 'ink';

interface HeaderProps {
	subtitle?: string;
	isDevMode?: boolean;
}

const Header: React.FC<HeaderProps> = ({subtitle, isDevMode}) => {
	return (
		<Box marginBottom={1} flexDirection="column">
			<Box>
				{isDevMode && (
					<>
						<Text color="black" backgroundColor="yellow" bold>
							DEV
						</Text>
						<Text> </Text>
					</>
				)}
				<Text color="cyan" bold>
					deskflip
				</Text>
				<Text color="yellow"> — standing desk helper</Text>
			</Box>
			{subtitle && (
				<Text bold color="magenta">
					{subtitle}
				</Text>
			)}
			<Text color="gray">────────────────────────────────────────</Text>
		</Box>
	);
};

export default Header;
