import { describe } from 'manten';

describe('inikit', ({ runTestSuite }) => {
	runTestSuite(import('./specs/general.js'));
	runTestSuite(import('./specs/ini.js'));
	runTestSuite(import('./specs/config.js'));
	runTestSuite(import('./specs/resources.js'));
	runTestSuite(import('./specs/options.js'));
	runTestSuite(import('./specs/fs.js'));
	runTestSuite(import('./specs/framespec.js'));
	runTestSuite(import('./specs/commands.js'));
});
