import { describe, expect, it } from "vitest";
import { createNodeId } from "../core/node-id.ts";
import { renderShell, renderWord } from "./codegen.ts";
import { structurallyEqual } from "./equality.ts";
import { parseShell } from "./parser.ts";

const render = (source: string) => renderShell(parseShell(source));

// =============================================================================
// Canonical layout
// =============================================================================

describe("Shell codegen - layout", () => {
  it("renders one statement per line", () => {
    expect(render("a; b\nc\n")).toBe("a\nb\nc\n");
  });

  it("renders if / elif / else with four-space indentation", () => {
    expect(render("if a; then b; elif c; then d; else e; fi\n")).toBe(
      "if a; then\n    b\nelif c; then\n    d\nelse\n    e\nfi\n",
    );
  });

  it("renders loops", () => {
    expect(render("for f in a b; do echo $f; done\n")).toBe("for f in a b; do\n    echo $f\ndone\n");
    expect(render("while read line; do :; done < in.txt\n")).toBe("while read line; do\n    :\ndone <in.txt\n");
    expect(render("for ((i=0;i<3;i++)); do :; done\n")).toBe("for ((i=0; i<3; i++)); do\n    :\ndone\n");
  });

  it("renders case clauses", () => {
    expect(render("case $x in a|b) echo ab;; *) echo other;; esac\n")).toBe(
      "case $x in\n    a | b)\n        echo ab\n        ;;\n    *)\n        echo other\n        ;;\nesac\n",
    );
  });

  it("renders functions and groups", () => {
    expect(render("greet() { echo hi; }\n")).toBe("greet() {\n    echo hi\n}\n");
    expect(render("function f { :; }\n")).toBe("function f() {\n    :\n}\n");
    expect(render("(cd /tmp && ls) > out\n")).toBe("(\n    cd /tmp && ls\n) >out\n");
  });

  it("renders lists, pipelines and redirections", () => {
    expect(render("a && b || c &\n")).toBe("a && b || c &\n");
    expect(render("! ps aux | grep x |& tee log\n")).toBe("! ps aux | grep x |& tee log\n");
    expect(render("make > build.log 2>&1\n")).toBe("make >build.log 2>&1\n");
  });

  it("renders [[ ]] and (( )) commands", () => {
    expect(render("[[ -f $f && ! $x == y ]]\n")).toBe("[[ -f $f && ! $x == y ]]\n");
    expect(render("((n += 1))\n")).toBe("((n += 1))\n");
  });

  it("renders assignments", () => {
    expect(render("export A=1\nB+=(x y)\nC=\nLANG=C sort f\n")).toBe("export A=1\nB+=(x y)\nC=\nLANG=C sort f\n");
  });

  it("renders here-documents after their command", () => {
    const source = "cat <<EOF > out\nhello $USER\nEOF\necho done\n";
    expect(render(source)).toBe("cat <<EOF >out\nhello $USER\nEOF\necho done\n");
  });

  it("renders substitutions", () => {
    expect(render("x=$(date +%s)\ny=`pwd`\n")).toBe("x=$(date +%s)\ny=`pwd`\n");
  });

  it("keeps comments, trailing ones included", () => {
    expect(render("# header\necho hi # note\n")).toBe("# header\necho hi # note\n");
  });

  it("quotes an argument that spells a reserved word", () => {
    expect(render("echo 'done'\n")).toBe("echo 'done'\n");
    const program = parseShell("echo done\n");
    expect(renderShell(program)).toBe("echo 'done'\n");
  });

  it("renders an empty word as ''", () => {
    expect(render("echo ''\n")).toBe("echo ''\n");
  });
});

// =============================================================================
// Formatting options
// =============================================================================

describe("Shell codegen - formatting", () => {
  const spaced = "a\n\n\n\nb\n";

  it("collapses blank lines by default", () => {
    expect(render(spaced)).toBe("a\n\nb\n");
  });

  it("keeps blank lines with skipBlankLineRemoval", () => {
    expect(renderShell(parseShell(spaced), { skipBlankLineRemoval: true })).toBe(spaced);
  });

  it("joins continued arguments unless asked to keep them", () => {
    const program = parseShell("cmd a \\\n  b\n");
    expect(renderShell(program)).toBe("cmd a b\n");
    expect(renderShell(program, { skipConsolidation: true })).toBe("cmd a \\\n    b\n");
  });

  it("wraps commands longer than the maximum line length", () => {
    const program = parseShell("echo alpha beta gamma delta\n");
    expect(renderShell(program, { maxLineLength: 16 })).toBe("echo alpha \\\n    beta gamma \\\n    delta\n");
  });

  it("emits guard text after the statement it belongs to", () => {
    const program = parseShell("if a; then\n  x=1\nfi\n");
    const [node] = program.body;
    const assignment = node?.type === "IfStatement" ? node.consequent[0] : undefined;
    const guards = new Map([[assignment?.id ?? createNodeId(-1), 'test -n "$x"']]);
    expect(renderShell(program, { guards })).toBe('if a; then\n    x=1\n    test -n "$x"\nfi\n');
  });
});

// =============================================================================
// select lowering
// =============================================================================

describe("Shell codegen - select", () => {
  it("lowers select to a POSIX menu loop", () => {
    expect(render("select opt in x y; do echo $opt; done\n")).toBe(
      [
        "while true; do",
        "    _select_index=1",
        "    for _select_item in x y; do",
        `        printf '%s) %s\\n' "$_select_index" "$_select_item" >&2`,
        "        _select_index=$((_select_index + 1))",
        "    done",
        `    printf '%s' "\${PS3:-#? }" >&2`,
        "    IFS= read -r REPLY || break",
        "    opt=",
        "    _select_index=1",
        "    for _select_item in x y; do",
        `        if [ "$_select_index" = "$REPLY" ]; then`,
        "            opt=$_select_item",
        "        fi",
        "        _select_index=$((_select_index + 1))",
        "    done",
        "    echo $opt",
        "done",
        "",
      ].join("\n"),
    );
  });

  it("renders the lowered loop in its own canonical layout", () => {
    const once = render("select opt in x y; do echo $opt; done\n");
    expect(render(once)).toBe(once);
  });
});

// =============================================================================
// Round trip
// =============================================================================

describe("Shell codegen - round trip", () => {
  const scripts = [
    "#!/bin/sh\nset -eu\nname=${1:-world}\necho \"hello $name\"\n",
    "for f in *.txt; do\n  if [ -s \"$f\" ]; then wc -l \"$f\"; fi\ndone\n",
    "case \"$1\" in\n  start) run;;\n  stop|halt) halt ;&\n  *) usage\nesac\n",
    "cleanup() {\n  rm -f \"$tmp\"\n}\ntrap cleanup EXIT\n",
    "while [ $# -gt 0 ]; do shift; done 2>/dev/null\n",
    "out=$(grep -c x file | sort)\ncount=$((count + 1))\n",
    "cat <<'EOF' >/etc/motd\nwelcome $USER\nEOF\n",
  ];

  for (const script of scripts) {
    it(`parses its own output back to the same tree: ${JSON.stringify(script.split("\n")[0])}`, () => {
      const tree = parseShell(script);
      expect(structurallyEqual(parseShell(renderShell(tree)), tree)).toBe(true);
    });
  }

  it("is a fixed point after one rendering", () => {
    for (const script of scripts) {
      const once = render(script);
      expect(render(once)).toBe(once);
    }
  });

  it("renders single words", () => {
    const program = parseShell(`echo "a $b" \${c:-d} $'e\\n'\n`);
    const [command] = program.body;
    const words = command?.type === "Command" ? command.args.map(renderWord) : [];
    expect(words).toEqual(['"a $b"', "${c:-d}", "$'e\\n'"]);
  });
});
