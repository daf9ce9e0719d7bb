export { User, IUser } from './User';
export { Transaction, ITransaction } from './Transaction';
export { Voucher, IVoucher } from './Voucher';
export { VoucherUse, IVoucherUse } from './VoucherUse';
export { Reservation, IReservation } from './Reservation';
export { CidRequest, ICidRequest } from './CidRequest';
export { AdminLog, IAdminLog } from './AdminLog';
