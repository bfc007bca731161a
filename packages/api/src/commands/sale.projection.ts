import type { Sale, SaleItemSnapshot, SaleStatus } from '@sale-records/domain'

// ---------------------------------------------------------------------------
// Result projections returned by the command handlers
// ---------------------------------------------------------------------------

export interface SaleItemDto {
  id: string
  saleId: string | null
  productId: string
  productName: string
  unitPrice: number
  quantity: number
  discountPercentage: number
  discountAmount: number
  totalAmount: number
  isCancelled: boolean
}

export interface SaleDto {
  id: string
  saleNumber: number
  saleDate: Date
  customerId: string
  customerName: string
  branchId: string
  branchName: string
  totalAmount: number
  status: SaleStatus
  createdAt: Date
  updatedAt: Date | null
  items: SaleItemDto[]
}

function toSaleItemDto(item: SaleItemSnapshot): SaleItemDto {
  return {
    id: item.id,
    saleId: item.saleId,
    productId: item.productId,
    productName: item.productName,
    unitPrice: item.unitPrice,
    quantity: item.quantity,
    discountPercentage: item.discountPercentage,
    discountAmount: item.discountAmount,
    totalAmount: item.totalAmount,
    isCancelled: item.isCancelled,
  }
}

export function toSaleDto(sale: Sale): SaleDto {
  return {
    id: sale.id,
    saleNumber: sale.saleNumber,
    saleDate: sale.saleDate,
    customerId: sale.customerId,
    customerName: sale.customerName,
    branchId: sale.branchId,
    branchName: sale.branchName,
    totalAmount: sale.totalAmount,
    status: sale.status,
    createdAt: sale.createdAt,
    updatedAt: sale.updatedAt,
    items: sale.items.map(toSaleItemDto),
  }
}
