// samples/roundtrip.ts
// usage: tsx samples/roundtrip.ts <file.mid> [semitones]
import { readFileSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import { encodeMidi, MidiParseError, parseMidi, transpose } from "../src/index";

function main() {
  const [input, shift] = process.argv.slice(2);
  if (!input) {
    console.error("usage: roundtrip <file.mid> [semitones]");
    process.exitCode = 2;
    return;
  }

  const midiPath = path.resolve(input);
  const bytes = readFileSync(midiPath);

  try {
    const midi = parseMidi(bytes);
    console.log(
      `format ${midi.format}, ${midi.ticksPerQuarter} ticks/quarter, ${midi.tracks.length} tracks`,
    );
    midi.tracks.forEach((track, i) => {
      const notes = track.events.filter((e) => e.type === "note").length;
      console.log(`  track ${i + 1}: ${track.events.length} events, ${notes} notes`);
    });

    if (shift !== undefined) transpose(midi.tracks, Number.parseInt(shift, 10));

    const output = encodeMidi(midi);
    const outPath = midiPath.replace(/\.midi?$/i, "") + ".out.mid";
    writeFileSync(outPath, output);
    console.log(
      shift === undefined && Buffer.compare(Buffer.from(output), bytes) === 0
        ? `wrote ${outPath} (identical)`
        : `wrote ${outPath}`,
    );
  } catch (err) {
    if (err instanceof MidiParseError) {
      console.error(`${err.name}: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

main();
