// ---------------------------------------------------------------------------
// Sequelize models for the sales tables
//
//   sales       one row per aggregate; sale_number is unique
//   sale_items  child rows, ON DELETE CASCADE, ordered by line_number
//
// Money columns are DECIMAL(18,2) and sale_number is BIGINT; the pg driver
// returns both as strings, hence the `number | string` attribute types.
// ---------------------------------------------------------------------------

import {
  DataTypes,
  Model,
  type CreationOptional,
  type InferAttributes,
  type InferCreationAttributes,
  type NonAttribute,
  type Sequelize,
} from 'sequelize'
import { NAME_MAX_LENGTH, SALE_STATUSES, type SaleStatus } from '@sale-records/domain'

export class SaleItemRow extends Model<InferAttributes<SaleItemRow>, InferCreationAttributes<SaleItemRow>> {
  declare id: string
  declare saleId: string
  declare lineNumber: number
  declare productId: string
  declare productName: string
  declare unitPrice: number | string
  declare quantity: number
  declare discountPercentage: number
  declare discountAmount: number | string
  declare totalAmount: number | string
  declare isCancelled: CreationOptional<boolean>
}

export class SaleRow extends Model<
  InferAttributes<SaleRow, { omit: 'items' }>,
  InferCreationAttributes<SaleRow, { omit: 'items' }>
> {
  declare id: string
  declare saleNumber: number | string
  declare saleDate: Date
  declare customerId: string
  declare customerName: string
  declare branchId: string
  declare branchName: string
  declare totalAmount: number | string
  declare status: SaleStatus
  declare createdAt: Date
  declare updatedAt: Date | null

  declare items?: NonAttribute<SaleItemRow[]>
}

export interface SaleModels {
  readonly SaleRow: typeof SaleRow
  readonly SaleItemRow: typeof SaleItemRow
}

const money = () => DataTypes.DECIMAL(18, 2)

/** Initialises both models on `sequelize` and wires the items association. */
export function defineSaleModels(sequelize: Sequelize): SaleModels {
  SaleRow.init(
    {
      id: { type: DataTypes.UUID, primaryKey: true },
      saleNumber: { type: DataTypes.BIGINT, allowNull: false, unique: 'sales_sale_number_key' },
      saleDate: { type: DataTypes.DATE, allowNull: false },
      customerId: { type: DataTypes.UUID, allowNull: false },
      customerName: { type: DataTypes.STRING(NAME_MAX_LENGTH), allowNull: false },
      branchId: { type: DataTypes.UUID, allowNull: false },
      branchName: { type: DataTypes.STRING(NAME_MAX_LENGTH), allowNull: false },
      totalAmount: { type: money(), allowNull: false, defaultValue: 0 },
      status: { type: DataTypes.ENUM(...SALE_STATUSES), allowNull: false },
      createdAt: { type: DataTypes.DATE, allowNull: false },
      updatedAt: { type: DataTypes.DATE, allowNull: true },
    },
    {
      sequelize,
      tableName: 'sales',
      underscored: true,
      timestamps: false,
    },
  )

  SaleItemRow.init(
    {
      id: { type: DataTypes.UUID, primaryKey: true },
      saleId: {
        type: DataTypes.UUID,
        allowNull: false,
        references: { model: 'sales', key: 'id' },
        onDelete: 'CASCADE',
      },
      lineNumber: { type: DataTypes.INTEGER, allowNull: false },
      productId: { type: DataTypes.UUID, allowNull: false },
      productName: { type: DataTypes.STRING(NAME_MAX_LENGTH), allowNull: false },
      unitPrice: { type: money(), allowNull: false },
      quantity: { type: DataTypes.INTEGER, allowNull: false },
      discountPercentage: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      discountAmount: { type: money(), allowNull: false, defaultValue: 0 },
      totalAmount: { type: money(), allowNull: false, defaultValue: 0 },
      isCancelled: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
    },
    {
      sequelize,
      tableName: 'sale_items',
      underscored: true,
      timestamps: false,
      indexes: [{ fields: ['sale_id', 'product_id'] }],
    },
  )

  SaleRow.hasMany(SaleItemRow, { as: 'items', foreignKey: 'saleId', onDelete: 'CASCADE' })
  SaleItemRow.belongsTo(SaleRow, { foreignKey: 'saleId' })

  return { SaleRow, SaleItemRow }
}
