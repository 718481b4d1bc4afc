// ══════════════════════════════════════════════════════════════════════════════
//  Demo
// ══════════════════════════════════════════════════════════════════════════════

import { isCanceled, isQuit, ItemList, listItem, Picker, prompt, showcase, TextInput } from "../src";

async function main(): Promise<void> {
    // ─── A form built from single widgets ────────────────────────────────────
    const name = await prompt(
        new TextInput("", { prompt: "Name: ", placeholder: "e.g. Jane Doe", charLimit: 40 }),
    ).catch((err: unknown) => {
        if (isCanceled(err)) return "anonymous";
        throw err;
    });

    const lang = new ItemList(
        [
            listItem("TypeScript", "Typed JavaScript"),
            listItem("Rust", "Memory safety without a collector"),
            listItem("Kotlin", "Concise code on the JVM"),
            listItem("Python", "Batteries included"),
        ],
        { title: "Favourite language" },
    );
    const item = await prompt(lang);

    const theme = new Picker(["Light", "Dark", "System"], {
        label: "Theme",
        horizontal: true,
        selectedIndex: 1,
    });
    await prompt(theme);

    process.stdout.write(`\n${name} likes ${item?.title ?? "nothing"} on a ${theme.selectedItem()} theme.\n\n`);

    // ─── Every widget, one after the other ───────────────────────────────────
    await showcase({ write: (text) => process.stdout.write(text) });
}

main().catch((err: unknown) => {
    if (isQuit(err)) process.exit(0);
    if (isCanceled(err)) {
        process.stdout.write("Canceled\n");
        return;
    }
    process.stderr.write(`Error running program: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
});
