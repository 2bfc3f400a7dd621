#!/usr/bin/env node
import { GodotExporter, isExportError, parseCliArgs, renderHelpText } from './godot_export/index.js';

async function main() {
    const parsed = parseCliArgs(process.argv.slice(2));
    if (parsed.options === null) {
        if (parsed.error === 'help') {
            console.log(renderHelpText());
            return;
        }
        console.error(`godot-scene-export: ${parsed.error}`);
        console.error(renderHelpText());
        process.exitCode = 1;
        return;
    }

    try {
        const exporter = new GodotExporter(parsed.options.settings);
        await exporter.exportFile(parsed.options.sourcePath);
        console.log('\n✅ Export successful!');
    } catch (error) {
        if (isExportError(error)) {
            console.error(`\n❌ Export failed [${error.code}]: ${error.message}`);
        } else {
            console.error(`\n❌ Export failed: ${error}`);
        }
        process.exitCode = 1;
    }
}

void main();
