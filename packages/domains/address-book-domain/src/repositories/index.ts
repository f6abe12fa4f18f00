export { AddressBook } from './address-book.js';
