import ts from "typescript";

import type { Decl, Field, Type } from "@rebind/core/model.js";
import {
  anyType,
  classDecl,
  classType,
  exportsDecl,
  funcDecl,
  moduleDecl,
  namedType,
  objectType,
  typeDecl,
  unknownDecl,
  varDecl,
} from "@rebind/core/model.js";

import type { ExtractCtx } from "./common.js";
import { hasModifier, propertyNameText, skip } from "./common.js";
import { membersToFields, signatureToModel, typeNodeToModel } from "./types.js";

function classMembersToFields(decl: ts.ClassDeclaration, ctx: ExtractCtx): readonly Field[] {
  const className = decl.name?.text ?? "default";
  const fields: Field[] = [];
  for (const m of decl.members) {
    if (hasModifier(m, ts.SyntaxKind.PrivateKeyword) || hasModifier(m, ts.SyntaxKind.ProtectedKeyword)) continue;
    if (hasModifier(m, ts.SyntaxKind.StaticKeyword)) {
      skip(ctx, "declaration", m, "Static class members are not bound.");
      continue;
    }
    if (ts.isConstructorDeclaration(m)) {
      fields.push({ name: "constructor", type: signatureToModel(m, ctx, namedType(className)) });
      continue;
    }
    if (ts.isPropertyDeclaration(m)) {
      const name = propertyNameText(m.name);
      if (name === undefined) continue;
      fields.push({ name, type: m.type ? typeNodeToModel(m.type, ctx) : anyType() });
      continue;
    }
    if (ts.isMethodDeclaration(m)) {
      const name = propertyNameText(m.name);
      if (name === undefined || fields.some((f) => f.name === name)) continue;
      fields.push({ name, type: signatureToModel(m, ctx) });
      continue;
    }
    skip(ctx, "declaration", m, "Only constructors, properties and methods are bound.");
  }
  return fields;
}

function exportAssignmentToModel(
  stmt: ts.ExportAssignment,
  scope: readonly Decl[],
  ctx: ExtractCtx
): Decl {
  if (!ts.isIdentifier(stmt.expression)) {
    skip(ctx, "declaration", stmt, "Only `export = <identifier>` is bound.");
    return unknownDecl();
  }
  const name = stmt.expression.text;
  const target = scope.find(
    (d): d is Extract<Decl, { readonly kind: "var" | "func" }> =>
      (d.kind === "var" || d.kind === "func") && d.name === name
  );
  const type: Type = target ? target.type : namedType(name);
  return exportsDecl(type);
}

export function statementsToDecls(statements: readonly ts.Statement[], ctx: ExtractCtx): readonly Decl[] {
  const out: Decl[] = [];
  for (const stmt of statements) {
    if (ts.isVariableStatement(stmt)) {
      for (const d of stmt.declarationList.declarations) {
        const name = propertyNameText(d.name);
        if (name === undefined) {
          skip(ctx, "declaration", d, "Destructured variable declarations are not bound.");
          continue;
        }
        out.push(varDecl(name, d.type ? typeNodeToModel(d.type, ctx) : anyType()));
      }
      continue;
    }
    if (ts.isFunctionDeclaration(stmt)) {
      if (!stmt.name) {
        out.push(exportsDecl(signatureToModel(stmt, ctx)));
        continue;
      }
      const name = stmt.name.text;
      // Overloads: the first signature is kept.
      if (out.some((d) => d.kind === "func" && d.name === name)) continue;
      out.push(funcDecl(name, signatureToModel(stmt, ctx)));
      continue;
    }
    if (ts.isClassDeclaration(stmt)) {
      out.push(classDecl(stmt.name?.text ?? "default", classType(classMembersToFields(stmt, ctx))));
      continue;
    }
    if (ts.isInterfaceDeclaration(stmt)) {
      out.push(typeDecl(stmt.name.text, objectType(membersToFields(stmt.members, ctx))));
      continue;
    }
    if (ts.isTypeAliasDeclaration(stmt)) {
      out.push(typeDecl(stmt.name.text, typeNodeToModel(stmt.type, ctx)));
      continue;
    }
    if (ts.isModuleDeclaration(stmt)) {
      out.push(moduleToDecl(stmt, ctx));
      continue;
    }
    if (ts.isExportAssignment(stmt)) {
      out.push(exportAssignmentToModel(stmt, out, ctx));
      continue;
    }
    skip(ctx, "declaration", stmt, `Unsupported statement '${ts.SyntaxKind[stmt.kind]}'.`);
    out.push(unknownDecl());
  }
  return out;
}

export function moduleToDecl(decl: ts.ModuleDeclaration, ctx: ExtractCtx): Decl {
  const name = decl.name.getText(ctx.sourceFile);
  const body = decl.body;
  if (!body) return moduleDecl(name, []);
  if (ts.isModuleDeclaration(body)) {
    // `namespace A.B {}` nests B inside A.
    return moduleDecl(name, [moduleToDecl(body, ctx)]);
  }
  if (ts.isModuleBlock(body)) return moduleDecl(name, statementsToDecls(body.statements, ctx));
  return moduleDecl(name, []);
}
