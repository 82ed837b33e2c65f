export {
	createFileAccessLedger,
	type FileAccessLedger,
	type FileAccessRecord,
	type LedgerCheck,
	type LedgerFailureCode,
} from './file-ledger.js';
