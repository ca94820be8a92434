import { EOL } from "node:os";
import { describe, expect, test } from "vitest";
import { LogLevel } from "../levels/index.js";
import { LogRecord, renderRecord, renderRecordText } from "./record.js";

const nl = (text: string): string => text.replace(/\n/g, EOL);

function createRecord(overrides: Partial<ConstructorParameters<typeof LogRecord>[0]> = {}): LogRecord {
	return new LogRecord({
		number: 1,
		logTime: "2026-10-19T12:00:00.000000",
		message: "hello",
		level: LogLevel.Info,
		group: "A",
		stacktrace: "at caller (file.ts:1:1)",
		...overrides,
	});
}

describe("LogRecord", () => {
	test("defaults group to None and retryOnError to true", () => {
		const record = createRecord({ group: undefined });

		expect(record.group).toBe("None");
		expect(record.owner).toBeUndefined();
		expect(record.retryOnError).toBe(true);
		expect(record.hasException).toBe(false);
	});

	test("includes the stacktrace for severe levels or when asked", () => {
		expect(createRecord({ level: LogLevel.Error }).includesStacktrace).toBe(true);
		expect(createRecord({ level: LogLevel.Warning }).includesStacktrace).toBe(false);
		expect(
			createRecord({ level: LogLevel.Debug, logStack: true }).includesStacktrace,
		).toBe(true);
	});
});

describe("renderRecordText", () => {
	test("renders a minimal record", () => {
		expect(renderRecordText(createRecord())).toBe(
			nl(
				'\t<Log Number="1" Level="Info" Group="A" LogTime="2026-10-19T12:00:00.000000">\n' +
					"\t\t<Message><!--\n\t\t\t-->hello<!--\n\t\t--></Message>\n" +
					"\t</Log>",
			),
		);
	});

	test("adds owner and write time attributes in order", () => {
		const text = renderRecordText(
			createRecord({ owner: "loader" }),
			"2026-10-19T12:00:01.000000",
		);

		expect(text.split(EOL)[0]).toBe(
			'\t<Log Number="1" Level="Info" Group="A" Owner="loader" LogTime="2026-10-19T12:00:00.000000" WriteTime="2026-10-19T12:00:01.000000">',
		);
	});

	test("renders exception and stacktrace sections for errors", () => {
		const text = renderRecordText(
			createRecord({
				level: LogLevel.Error,
				exception: "disk on fire",
				stacktrace: "frame one\nframe two",
			}),
		);

		expect(text).toBe(
			nl(
				'\t<Log Number="1" Level="Error" Group="A" LogTime="2026-10-19T12:00:00.000000">\n' +
					"\t\t<Message><!--\n\t\t\t-->hello<!--\n\t\t--></Message>\n" +
					"\t\t<Exception><!--\n\t\t\t-->disk on fire<!--\n\t\t--></Exception>\n" +
					"\t\t<Stacktrace><!--\n\t\t\t-->frame one\n<!--\t\t-->frame two<!--\n\t\t--></Stacktrace>\n" +
					"\t</Log>",
			),
		);
	});

	test("escapes message text and attributes", () => {
		const text = renderRecordText(
			createRecord({ message: "a <b> & -->", group: 'say "x"' }),
		);

		expect(text).toContain('Group="say &quot;x&quot;"');
		expect(text).toContain("-->a &lt;b&gt; &amp; --&gt;<!--");
	});
});

describe("renderRecord", () => {
	test("encodes as UTF-8", () => {
		const bytes = renderRecord(createRecord({ message: "héllo" }));
		expect(bytes.toString("utf8")).toContain("-->héllo<!--");
	});
});
