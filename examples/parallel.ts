import { ParallelProgress } from '../mod.ts';

const goal = 100;

const progress = new ParallelProgress(goal, {
	label: 'downloads',
	progressBarSymbolComplete: '*',
	progressBarSymbolIncomplete: '.',
});

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// * ten concurrent producers share one bar
await Promise.all(Array.from({ length: 10 }, async (_, producer) => {
	for (let i = 0; i < goal / 10; i++) {
		await sleep(30 + 10 * producer);
		await progress.next();
	}
}));
await progress.join();
