import { MultipleProgress } from '../mod.ts';

const lengths = [30, 50, 20, 40, 10, 60];
const concurrency = 3;

const progress = new MultipleProgress(lengths, {
	label: 'total',
	hideCursor: true,
	progressTemplate: '[{bar}] {label} {percent}% ({elapsed}s) {value}/{goal}',
	progressBarSymbolComplete: '=',
	progressBarSymbolIncomplete: '-',
	workers: lengths.map((_, idx) => ({ label: `task ${idx + 1}`, color: (idx % 2) ? 'cyan' : 'yellow' })),
});

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// * only `concurrency` tasks run at once; finished tasks hand their display line to the next task
let nextTask = 0;
async function runner() {
	while (nextTask < progress.amount) {
		const worker = progress.handles[nextTask++];
		for (let i = 0; i < worker.total; i++) {
			await sleep(20 + Math.random() * 80);
			await worker.next();
		}
	}
}

await Promise.all(Array.from({ length: concurrency }, () => runner()));
await progress.join();
console.log(`done; ${progress.highWaterOffset} worker lines used for ${progress.amount} tasks`);
