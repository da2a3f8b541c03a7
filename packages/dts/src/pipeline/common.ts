import ts from "typescript";

export type SkipIssue = {
  readonly file: string;
  readonly kind: "type" | "declaration";
  readonly snippet: string;
  readonly reason: string;
};

export type ExtractCtx = {
  readonly sourceFile: ts.SourceFile;
  readonly issues: SkipIssue[];
};

export function skip(ctx: ExtractCtx, kind: SkipIssue["kind"], node: ts.Node, reason: string): void {
  ctx.issues.push({
    file: ctx.sourceFile.fileName,
    kind,
    snippet: node.getText(ctx.sourceFile).replaceAll(/\s+/g, " ").slice(0, 80),
    reason,
  });
}

export function propertyNameText(name: ts.PropertyName | ts.BindingName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text;
  }
  return undefined;
}

export function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some((m) => m.kind === kind);
}
