import pino from "pino";
import { config } from "../config";

function destination(): pino.DestinationStream | undefined {
	if (!config.logging.file) return undefined;

	return pino.multistream([
		{ stream: process.stdout },
		{
			stream: pino.destination({
				dest: config.logging.file,
				mkdir: true,
				sync: false,
			}),
		},
	]);
}

const stream = destination();

export const logger = stream
	? pino({ level: config.logging.level }, stream)
	: pino({ level: config.logging.level });
