import ts from "typescript";

import type { Field, Param, Type } from "@rebind/core/model.js";
import {
  anyType,
  arrayType,
  booleanType,
  dictType,
  functionType,
  namedType,
  nullType,
  numberType,
  objectType,
  optionalType,
  regexType,
  stringType,
  tupleType,
  unionType,
  unitType,
  unknownType,
} from "@rebind/core/model.js";

import type { ExtractCtx } from "./common.js";
import { propertyNameText, skip } from "./common.js";

function entityNameToSegments(name: ts.EntityName): readonly string[] {
  if (ts.isIdentifier(name)) return [name.text];
  return [...entityNameToSegments(name.left), name.right.text];
}

const keywordTypes = new Map<ts.SyntaxKind, () => Type>([
  [ts.SyntaxKind.NumberKeyword, numberType],
  [ts.SyntaxKind.BigIntKeyword, numberType],
  [ts.SyntaxKind.StringKeyword, stringType],
  [ts.SyntaxKind.BooleanKeyword, booleanType],
  [ts.SyntaxKind.VoidKeyword, unitType],
  [ts.SyntaxKind.UndefinedKeyword, unitType],
  [ts.SyntaxKind.AnyKeyword, anyType],
  [ts.SyntaxKind.ObjectKeyword, anyType],
  [ts.SyntaxKind.UnknownKeyword, unknownType],
  [ts.SyntaxKind.NeverKeyword, unknownType],
]);

function literalToModel(node: ts.LiteralTypeNode): Type {
  const lit = node.literal;
  if (lit.kind === ts.SyntaxKind.NullKeyword) return nullType();
  if (lit.kind === ts.SyntaxKind.TrueKeyword || lit.kind === ts.SyntaxKind.FalseKeyword) return booleanType();
  if (ts.isStringLiteral(lit) || ts.isNoSubstitutionTemplateLiteral(lit)) return stringType();
  if (ts.isNumericLiteral(lit) || ts.isBigIntLiteral(lit) || ts.isPrefixUnaryExpression(lit)) return numberType();
  return unknownType();
}

function referenceToModel(node: ts.TypeReferenceNode, ctx: ExtractCtx): Type {
  const segments = entityNameToSegments(node.typeName);
  const baseName = segments[segments.length - 1] ?? "";
  const args = node.typeArguments ?? [];

  if (segments.length === 1) {
    if (baseName === "RegExp") return regexType();
    if ((baseName === "Array" || baseName === "ReadonlyArray") && args.length === 1) {
      const [inner] = args;
      if (inner) return arrayType(typeNodeToModel(inner, ctx));
    }
    if (baseName === "Record" && args.length === 2) {
      const [key, value] = args;
      if (key && value && key.kind === ts.SyntaxKind.StringKeyword) {
        return dictType(typeNodeToModel(value, ctx));
      }
    }
  }
  return namedType(baseName);
}

function paramsToModel(
  parameters: readonly ts.ParameterDeclaration[],
  ctx: ExtractCtx
): readonly Param[] {
  return parameters.flatMap((p, i) => {
    const name = propertyNameText(p.name) ?? `arg${i}`;
    if (name === "this") return [];
    const base = p.type ? typeNodeToModel(p.type, ctx) : anyType();
    const type = p.dotDotDotToken && base.kind !== "array" ? arrayType(base) : base;
    return [{ name, type: p.questionToken || p.initializer ? optionalType(type) : type }];
  });
}

export function signatureToModel(
  sig: ts.SignatureDeclarationBase,
  ctx: ExtractCtx,
  ret?: Type
): Type {
  return functionType(paramsToModel(sig.parameters, ctx), ret ?? (sig.type ? typeNodeToModel(sig.type, ctx) : unitType()));
}

export function membersToFields(members: readonly ts.TypeElement[], ctx: ExtractCtx): readonly Field[] {
  const fields: Field[] = [];
  for (const m of members) {
    if (ts.isPropertySignature(m)) {
      const name = propertyNameText(m.name);
      if (name === undefined) {
        skip(ctx, "type", m, "Computed property names have no field name.");
        continue;
      }
      fields.push({ name, type: m.type ? typeNodeToModel(m.type, ctx) : anyType() });
      continue;
    }
    if (ts.isMethodSignature(m)) {
      const name = propertyNameText(m.name);
      if (name === undefined) {
        skip(ctx, "type", m, "Computed method names have no field name.");
        continue;
      }
      // Overloads: the first signature is kept.
      if (fields.some((f) => f.name === name)) continue;
      fields.push({ name, type: signatureToModel(m, ctx) });
      continue;
    }
    skip(ctx, "type", m, "Only property and method signatures are translated.");
  }
  return fields;
}

function typeLiteralToModel(node: ts.TypeLiteralNode, ctx: ExtractCtx): Type {
  const [only] = node.members;
  if (node.members.length === 1 && only && ts.isIndexSignatureDeclaration(only)) {
    const [key] = only.parameters;
    if (key?.type?.kind === ts.SyntaxKind.StringKeyword) {
      return dictType(typeNodeToModel(only.type, ctx));
    }
  }
  return objectType(membersToFields(node.members, ctx));
}

export function typeNodeToModel(typeNode: ts.TypeNode, ctx: ExtractCtx): Type {
  const keyword = keywordTypes.get(typeNode.kind);
  if (keyword) return keyword();
  if (ts.isParenthesizedTypeNode(typeNode)) return typeNodeToModel(typeNode.type, ctx);
  if (ts.isLiteralTypeNode(typeNode)) return literalToModel(typeNode);
  if (ts.isTypeReferenceNode(typeNode)) return referenceToModel(typeNode, ctx);
  if (ts.isArrayTypeNode(typeNode)) return arrayType(typeNodeToModel(typeNode.elementType, ctx));
  if (ts.isTypeOperatorNode(typeNode) && typeNode.operator === ts.SyntaxKind.ReadonlyKeyword) {
    return typeNodeToModel(typeNode.type, ctx);
  }
  if (ts.isTupleTypeNode(typeNode)) {
    return tupleType(
      typeNode.elements.map((el) => typeNodeToModel(ts.isNamedTupleMember(el) ? el.type : el, ctx))
    );
  }
  if (ts.isTypeLiteralNode(typeNode)) return typeLiteralToModel(typeNode, ctx);
  if (ts.isFunctionTypeNode(typeNode)) return signatureToModel(typeNode, ctx);
  if (ts.isUnionTypeNode(typeNode)) {
    const [first, ...rest] = typeNode.types.map((t) => typeNodeToModel(t, ctx));
    if (!first) return unknownType();
    return rest.length === 0 ? first : unionType([first, ...rest]);
  }
  skip(ctx, "type", typeNode, `Unsupported type syntax '${ts.SyntaxKind[typeNode.kind]}'.`);
  return unknownType();
}
