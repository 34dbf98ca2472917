/**
 * TypeBox schema for the JSON object DGII embeds in a GetContribuyentes
 * SOAP response. Extra keys are allowed and dropped on translation.
 */

import { Type, type Static } from '@sinclair/typebox'

/** Codes arrive as strings or as numbers */
const DgiiCode = Type.Union([Type.String(), Type.Number()])

export const DgiiContribuyenteSchema = Type.Object({
  RGE_RUC: Type.String({ minLength: 1 }),
  RGE_NOMBRE: Type.String(),
  NOMBRE_COMERCIAL: Type.Optional(Type.String()),
  CATEGORIA: DgiiCode,
  REGIMEN_PAGOS: DgiiCode,
  ESTATUS: DgiiCode,
  RNUM: Type.Optional(DgiiCode),
})
export type DgiiContribuyente = Static<typeof DgiiContribuyenteSchema>
